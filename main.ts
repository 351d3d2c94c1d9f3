#!/usr/bin/env node
import readline from 'readline';
import { createSleeperClient } from './sleeperApi';
import { runMenu } from './menu';
import { MUNGED_DIR, PUBLISH_DIR, RAW_DIR, REPORTS_DIR, SLEEPER_API_BASE, configuredLeagueId } from './config';
import { getLogger } from './logger';

const log = getLogger('main');

const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout
});

function question(prompt: string): Promise<string> {
    return new Promise(resolve => {
        rl.question(prompt, resolve);
    });
}

async function main() {
    try {
        await runMenu({
            ask: question,
            print: line => console.log(line),
            client: createSleeperClient({ baseUrl: SLEEPER_API_BASE }),
            rawDir: RAW_DIR,
            mungedDir: MUNGED_DIR,
            reportsDir: REPORTS_DIR,
            publishDir: PUBLISH_DIR,
            leagueId: configuredLeagueId(),
        });
    } finally {
        rl.close();
    }
}

main().catch(err => {
    log.error('Unexpected error', err);
    process.exitCode = 1;
});
