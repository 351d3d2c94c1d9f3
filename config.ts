import path from 'path';
import { config as loadEnv } from 'dotenv';

loadEnv();

export const SLEEPER_API_BASE = process.env.SLEEPER_API_BASE || 'https://api.sleeper.app/v1';

const DATA_DIR = path.resolve(process.cwd(), process.env.DATA_DIR || 'data');

export const RAW_DIR = path.join(DATA_DIR, 'raw');
export const MUNGED_DIR = path.join(DATA_DIR, 'munged');
export const REPORTS_DIR = path.join(DATA_DIR, 'reports');
export const PUBLISH_DIR = path.resolve(process.cwd(), process.env.PUBLISH_DIR || 'docs');

// Seasons before the configured one are discovered through previous_league_id.
export function configuredLeagueId(): string | undefined {
    const id = process.env.SLEEPER_LEAGUE_ID?.trim();
    return id ? id : undefined;
}

export const DEFAULT_PLAYOFF_WEEK_START = 15;
export const DEFAULT_LAST_SCORED_LEG = 17;
