import fs from 'fs';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createSleeperClient } from './sleeperApi';
import { pickSeasons, renderMenu, runMenu } from './menu';
import type { MenuContext, Prompt } from './menu';
import { copyFixtureRaw, fakeHttp, makeTempDir, removeDir } from './testUtils';

function scripted(answers: string[]): Prompt {
    const queue = [...answers];
    return async () => {
        const next = queue.shift();
        if (next === undefined) throw new Error('prompt asked more questions than scripted');
        return next;
    };
}

describe('pickSeasons', () => {
    const seasons = ['2024', '2023', '2022'];

    it('accepts a list number, a year or all', () => {
        expect(pickSeasons('2', seasons)).toEqual(['2023']);
        expect(pickSeasons('2022', seasons)).toEqual(['2022']);
        expect(pickSeasons('a', seasons)).toBe('all');
        expect(pickSeasons(' ALL ', seasons)).toBe('all');
        expect(pickSeasons('', seasons)).toBe('all');
        expect(pickSeasons('1', ['2024'])).toEqual(['2024']);
    });

    it('rejects anything else', () => {
        expect(pickSeasons('4', seasons)).toBeUndefined();
        expect(pickSeasons('2019', seasons)).toBeUndefined();
        expect(pickSeasons('x', seasons)).toBeUndefined();
    });
});

describe('runMenu', () => {
    let workDir: string;
    let printed: string[];
    let calls: string[];

    function context(answers: string[], leagueId?: string): MenuContext {
        const fake = fakeHttp({});
        calls = fake.calls;
        return {
            ask: scripted(answers),
            print: line => printed.push(line),
            client: createSleeperClient({ baseUrl: 'https://sleeper.test/v1', http: fake.http }),
            rawDir: path.join(workDir, 'raw'),
            mungedDir: path.join(workDir, 'munged'),
            reportsDir: path.join(workDir, 'reports'),
            publishDir: path.join(workDir, 'docs'),
            leagueId,
        };
    }

    beforeEach(() => {
        workDir = makeTempDir();
        printed = [];
    });

    afterEach(() => {
        removeDir(workDir);
    });

    it('lists every option', () => {
        expect(renderMenu().split('\n').slice(2)).toEqual([
            '1. Fetch league data from the Sleeper API',
            '2. Import/update player index',
            '3. Munge raw data',
            '4. Generate HTML reports',
            '5. Copy reports to the publish folder',
            '6. Exit',
        ]);
    });

    it('asks again after an invalid choice', async () => {
        await runMenu(context(['9', '6']));

        expect(printed).toContain('Invalid choice. Please try again.');
    });

    it('asks for a league id and does nothing when the fetch is declined', async () => {
        const ctx = context(['1', 'L1', 'n', '6']);
        await runMenu(ctx);

        expect(ctx.leagueId).toBe('L1');
        expect(calls).toEqual([]);
        expect(printed).toContain('Fetch cancelled.');
    });

    it('keeps running after an action fails', async () => {
        const ctx = context(['1', '', '5', '6']);
        await runMenu(ctx);

        expect(calls).toEqual([]);
        expect(fs.existsSync(ctx.publishDir)).toBe(false);
    });

    it('reports a failed fetch without stopping', async () => {
        await runMenu(context(['1', 'y', '6'], 'L404'));

        expect(calls).toEqual(['https://sleeper.test/v1/league/L404']);
        expect(printed).toContain('Fetched 0 season(s): none');
        expect(printed).toContain('  failed: league: HTTP 404 Not Found for https://sleeper.test/v1/league/L404');
    });

    it('munges, renders and publishes stored data', async () => {
        const ctx = context(['3', 'a', '4', '5', '6']);
        copyFixtureRaw(ctx.rawDir);

        await runMenu(ctx);

        expect(printed).toContain('  1. 2024');
        expect(printed).toContain('Munged 1 of 1 season(s).');
        expect(fs.existsSync(path.join(ctx.mungedDir, '2024', 'league.json'))).toBe(true);
        expect(fs.existsSync(path.join(ctx.reportsDir, 'index.html'))).toBe(true);
        expect(fs.existsSync(path.join(ctx.publishDir, '2024', 'week_1.html'))).toBe(true);
        expect(fs.existsSync(path.join(ctx.publishDir, 'all_time', 'head_to_head.html'))).toBe(true);
    });

    it('munges a single season picked by number and refreshes the all-time stats', async () => {
        const ctx = context(['3', '1', '6']);
        copyFixtureRaw(ctx.rawDir);

        await runMenu(ctx);

        expect(printed).toContain('Munged 2024.');
        expect(printed).toContain('Updated all-time stats across 1 season(s).');
        expect(fs.existsSync(path.join(ctx.mungedDir, 'all_time', 'standings.json'))).toBe(true);
    });
});
