export { config } from './config.js';
export { logger } from './utils/logger.js';
export { createRandom, weightedIndex, pick } from './utils/random.js';
export type { Random } from './utils/random.js';
export { parseTimeToMinutes, formatMinutes } from './utils/time.js';

export * from './features/mystery/types.js';
export * from './features/mystery/errors.js';
export { parseCaseFile, readCaseFile, CaseFileSchema } from './features/mystery/case-file.js';
export type { CaseFile, CaseFileInput, TraitModifier } from './features/mystery/case-file.js';
export { WorldVerifier } from './features/mystery/verifier.js';
export type { VerificationResult } from './features/mystery/verifier.js';
export { default as CaseWorld } from './features/mystery/world.js';
export type { NotApplicableReason, Resolution, RecordedFact } from './features/mystery/world.js';
export { topicKey, describeValue, sameValue } from './features/mystery/topics.js';
export { StatementLedger } from './features/mystery/ledger.js';
export type { StatementFilter } from './features/mystery/ledger.js';
export { ConsistencyEngine } from './features/mystery/consistency.js';
export { DeceptionPolicy, DEFAULT_TRAITS } from './features/mystery/deception.js';
export type { Distribution, DeceptionPolicyOptions } from './features/mystery/deception.js';
export { ResponseComposer } from './features/mystery/composer.js';
export type { ComposedAnswer, StatementRecorder } from './features/mystery/composer.js';
export { SuspicionTracker } from './features/mystery/suspicion.js';
export type { SuspicionWeights } from './features/mystery/suspicion.js';
export { AccusationDesk, scoreInvestigation } from './features/mystery/accusation.js';
export type { Accusation, AccusationResult, InvestigationStats } from './features/mystery/accusation.js';
export { analyzeTestimony } from './features/mystery/analysis.js';
export type { SuspectTestimony, TestimonyAnalysis } from './features/mystery/analysis.js';
export { CaseLogger } from './features/mystery/case-logger.js';
export type { LogType } from './features/mystery/case-logger.js';
export { InterrogationSession } from './features/mystery/session.js';
export type { Answer, ProfileUpdate, SessionOptions, TimelineEntry } from './features/mystery/session.js';
