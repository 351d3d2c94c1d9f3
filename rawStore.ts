import fs from 'fs';
import path from 'path';
import type { LeagueEndpoint, SleeperResponses, WeeklyEndpoint } from './sleeperApi';
import { decodeBody } from './sleeperApi';
import { DataFileError, errorMessage } from './errors';
import { getLogger } from './logger';

const log = getLogger('raw-store');

export type RawKey =
    | { endpoint: 'players' }
    | { endpoint: LeagueEndpoint; season: string }
    | { endpoint: WeeklyEndpoint; season: string; week: number }
    | { endpoint: 'draft_picks'; season: string; draftId: string };

const SEASON_FILES: Record<LeagueEndpoint, string> = {
    league: 'league_info.json',
    users: 'users.json',
    rosters: 'rosters.json',
    drafts: 'drafts.json',
    winners_bracket: 'playoffs_winnersbracket.json',
    losers_bracket: 'playoffs_losersbracket.json',
};

export function weekDirName(week: number): string {
    return `week_${week}`;
}

/**
 * Every key maps to exactly one file, so storing a key again replaces it.
 */
export function rawFilePath(rawDir: string, key: RawKey): string {
    switch (key.endpoint) {
        case 'players':
            return path.join(rawDir, 'players.json');
        case 'matchups':
        case 'transactions':
            return path.join(rawDir, key.season, weekDirName(key.week), `${key.endpoint}.json`);
        case 'draft_picks':
            return path.join(rawDir, key.season, `draft_picks_${key.draftId}.json`);
        default:
            return path.join(rawDir, key.season, SEASON_FILES[key.endpoint]);
    }
}

/** Writes the body unchanged; a string is stored as UTF-8. */
export function writeRaw(rawDir: string, key: RawKey, body: Buffer | string): string {
    const file = rawFilePath(rawDir, key);
    try {
        fs.mkdirSync(path.dirname(file), { recursive: true });
        fs.writeFileSync(file, body);
    } catch (err) {
        throw new DataFileError(`Could not write ${file}: ${errorMessage(err)}`, file);
    }
    return file;
}

/**
 * Parsed contents of a stored response, or undefined when the file is missing
 * or not valid JSON.
 */
export function readRaw<K extends RawKey>(rawDir: string, key: K): SleeperResponses[K['endpoint']] | undefined {
    const file = rawFilePath(rawDir, key);
    if (!fs.existsSync(file)) return undefined;
    try {
        return JSON.parse(decodeBody(fs.readFileSync(file))) as SleeperResponses[K['endpoint']];
    } catch (err) {
        log.warn(`Skipping malformed ${file}: ${errorMessage(err)}`);
        return undefined;
    }
}

function isNumericDir(dir: string, name: string): boolean {
    return /^\d+$/.test(name) && fs.statSync(path.join(dir, name)).isDirectory();
}

/** Seasons with a stored league_info.json, newest first. */
export function listRawSeasons(rawDir: string): string[] {
    if (!fs.existsSync(rawDir)) return [];
    return fs.readdirSync(rawDir)
        .filter(name => isNumericDir(rawDir, name))
        .filter(season => fs.existsSync(rawFilePath(rawDir, { endpoint: 'league', season })))
        .sort((a, b) => Number(b) - Number(a));
}

/** Week numbers with a stored week directory, ascending. */
export function listRawWeeks(rawDir: string, season: string): number[] {
    const seasonDir = path.join(rawDir, season);
    if (!fs.existsSync(seasonDir)) return [];
    return fs.readdirSync(seasonDir)
        .map(name => /^week_(\d+)$/.exec(name))
        .filter((m): m is RegExpExecArray => m !== null)
        .map(m => Number(m[1]))
        .sort((a, b) => a - b);
}
