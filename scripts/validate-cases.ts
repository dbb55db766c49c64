import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import { config } from '../src/config.js';
import { readCaseFile } from '../src/features/mystery/case-file.js';
import { DeceptionPolicy } from '../src/features/mystery/deception.js';
import { CaseFileError, MysteryError, WorldIntegrityError } from '../src/features/mystery/errors.js';
import { SuspectProfile } from '../src/features/mystery/types.js';
import CaseWorld from '../src/features/mystery/world.js';
import { createRandom } from '../src/utils/random.js';

/**
 * Load one case directory: schema, world integrity, then every suspect's
 * deception profile. Returns the problems found.
 */
function checkCase(caseDir: string): string[] {
    try {
        const world = CaseWorld.fromConfig(readCaseFile(caseDir));
        const policy = new DeceptionPolicy({ random: createRandom(0), traits: world.traitModifiers });
        const profiles: SuspectProfile[] = world.suspects.map(p => ({
            id: p.id,
            reliability: p.reliability,
            traits: p.traits,
            liar: p.liar,
            pressure: 0,
        }));
        policy.validate(profiles);
        // Fully cornered suspects must still have a valid distribution
        policy.validate(profiles.map(p => ({ ...p, pressure: 1 })));
        return [];
    } catch (error) {
        if (error instanceof CaseFileError || error instanceof WorldIntegrityError) {
            return error.issues;
        }
        if (error instanceof MysteryError) {
            return [error.message];
        }
        throw error;
    }
}

// --- Main ---
function main() {
    const casesDir = path.resolve(config.cases.dir);
    if (!fs.existsSync(casesDir)) {
        console.error(`No cases dir at ${casesDir}`);
        process.exit(1);
    }

    const folders = fs.readdirSync(casesDir, { withFileTypes: true })
        .filter(entry => entry.isDirectory())
        .map(entry => entry.name);
    let failures = false;

    console.log(`Found ${folders.length} cases.`);

    for (const folder of folders) {
        console.log(`Checking ${folder}...`);
        const issues = checkCase(path.join(casesDir, folder));
        if (issues.length > 0) {
            console.error(`❌ Errors in ${folder}:`);
            issues.forEach(issue => console.error(`  - ${issue}`));
            failures = true;
        } else {
            console.log(`✅ ${folder} OK`);
        }
    }

    if (failures) process.exit(1);
}

main();
