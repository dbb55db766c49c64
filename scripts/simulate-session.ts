import 'dotenv/config';
import path from 'path';
import { config } from '../src/config.js';
import { InterrogationSession } from '../src/features/mystery/session.js';
import { describeValue } from '../src/features/mystery/topics.js';
import { formatMinutes } from '../src/utils/time.js';

/**
 * Seeded automatic interrogation: every suspect is asked where they were at
 * the time of death, who saw them then and how they knew the victim, twice over.
 *
 * Usage: tsx scripts/simulate-session.ts [case-id] [seed]
 */
function main() {
    const caseId = process.argv[2] || 'blackwood-manor';
    const seed = process.argv[3] ? Number(process.argv[3]) : config.session.seed;
    if (!Number.isFinite(seed)) {
        console.error(`Seed must be a number, got '${process.argv[3]}'`);
        process.exit(1);
    }

    const session = InterrogationSession.open(path.join(config.cases.dir, caseId), { seed });
    const { world } = session;
    console.log(`🔎 ${world.name} (seed ${seed}), time of death ${formatMinutes(world.timeOfDeath)}`);

    for (let round = 1; round <= 2; round++) {
        console.log(`\n--- Round ${round} ---`);
        for (const suspect of world.suspects) {
            const questions = [
                { speaker: suspect.id, topic: { kind: 'whereabouts' as const, subject: suspect.id, time: world.timeOfDeath } },
                { speaker: suspect.id, topic: { kind: 'witnesses' as const, subject: suspect.id, time: world.timeOfDeath } },
                { speaker: suspect.id, topic: { kind: 'relationship' as const, subject: suspect.id, other: world.victim } },
            ];
            for (const question of questions) {
                const answer = session.ask(question);
                if (answer.kind === 'not-applicable') {
                    console.log(`  ${suspect.name}: (${answer.reason})`);
                    continue;
                }
                const { statement, findings } = answer;
                console.log(`  #${statement.sequence} ${suspect.name} on ${statement.topicKey}: ${describeValue(statement.value)} [${statement.status}]`);
                findings.forEach(f => console.log(`     ${f.kind === 'contradiction' ? '⚠️' : '🤝'} ${f.kind} (${f.rule})`));
            }
        }
    }

    console.log('\n--- Suspicion ---');
    const live = session.suspicion();
    const replayed = session.replaySuspicion();
    for (const suspect of world.suspects) {
        console.log(`  ${suspect.name.padEnd(16)} ${live[suspect.id].toFixed(2)}`);
    }

    const stable = world.suspects.every(s => live[s.id] === replayed[s.id]);
    if (!stable) {
        console.error('❌ Replayed suspicion differs from live suspicion');
        process.exit(1);
    }
    console.log('✅ Replay matches live suspicion');
}

main();
