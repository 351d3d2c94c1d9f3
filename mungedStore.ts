import fs from 'fs';
import path from 'path';
import { weekDirName } from './rawStore';

export type SeasonPhase = 'regular_season' | 'postseason';

export type MungedFile =
    | { file: 'rosters' | 'draft' | 'season_scores' | 'league' }
    | { file: 'standings'; phase: 'regular_season' }
    | { file: 'brackets'; phase: 'postseason' }
    | { file: 'recap' | 'transactions'; phase: SeasonPhase; week: number };

/**
 * <munged>/<season>/rosters.json, draft.json, season_scores.json, league.json
 * <munged>/<season>/regular_season/standings.json
 * <munged>/<season>/postseason/brackets.json
 * <munged>/<season>/<phase>/week_<n>/recap.json and transactions.json
 */
export function mungedFilePath(mungedDir: string, season: string, target: MungedFile): string {
    const seasonDir = path.join(mungedDir, season);
    switch (target.file) {
        case 'standings':
        case 'brackets':
            return path.join(seasonDir, target.phase, `${target.file}.json`);
        case 'recap':
        case 'transactions':
            return path.join(seasonDir, target.phase, weekDirName(target.week), `${target.file}.json`);
        default:
            return path.join(seasonDir, `${target.file}.json`);
    }
}

export function mungedSeasonDir(mungedDir: string, season: string): string {
    return path.join(mungedDir, season);
}

export function listMungedSeasons(mungedDir: string): string[] {
    if (!fs.existsSync(mungedDir)) return [];
    return fs.readdirSync(mungedDir)
        .filter(name => /^\d+$/.test(name) && fs.statSync(path.join(mungedDir, name)).isDirectory())
        .sort((a, b) => Number(b) - Number(a));
}

export const ALL_TIME_DIR = 'all_time';

export type AllTimeFile = 'standings' | 'head_to_head' | 'weekly_high_scores' | 'player_high_scores';

/** <munged>/all_time/<file>.json, built from every stored season */
export function allTimeFilePath(mungedDir: string, file: AllTimeFile): string {
    return path.join(mungedDir, ALL_TIME_DIR, `${file}.json`);
}
