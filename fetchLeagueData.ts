import type { LeagueEndpoint, SleeperClient, SleeperEndpoint, SleeperRequest, SleeperResponses } from './sleeperApi';
import type { RawKey } from './rawStore';
import type { SleeperLeague } from './sleeper-league';
import { writeRaw } from './rawStore';
import { SleeperApiError } from './errors';
import { getLogger } from './logger';

const log = getLogger('fetch');

export type FetchFailure = {
    season: string | null;
    endpoint: SleeperEndpoint;
    url: string;
    message: string;
};

export type FetchSummary = {
    seasons: string[];
    failures: FetchFailure[];
};

const SEASON_ENDPOINTS: LeagueEndpoint[] = ['users', 'rosters', 'winners_bracket', 'losers_bracket'];

function emptySummary(): FetchSummary {
    return { seasons: [], failures: [] };
}

/**
 * Fetches one endpoint and stores its body. API errors are logged and recorded
 * so the caller can move on to the next endpoint; filesystem errors propagate.
 */
async function fetchAndStore<R extends SleeperRequest>(
    client: SleeperClient,
    rawDir: string,
    request: R,
    key: RawKey,
    summary: FetchSummary,
    season: string | null
): Promise<SleeperResponses[R['endpoint']] | undefined> {
    try {
        const res = await client.fetchRaw(request);
        const file = writeRaw(rawDir, key, res.body);
        log.debug(`Saved ${file}`);
        return res.data;
    } catch (err) {
        if (!(err instanceof SleeperApiError)) throw err;
        log.error(`Failed to fetch ${request.endpoint}${season ? ` for ${season}` : ''}`, err);
        summary.failures.push({ season, endpoint: request.endpoint, url: err.url, message: err.message });
        return undefined;
    }
}

async function fetchLeagueInfo(
    client: SleeperClient,
    rawDir: string,
    leagueId: string,
    summary: FetchSummary
): Promise<SleeperLeague | undefined> {
    try {
        const res = await client.fetchRaw({ endpoint: 'league', leagueId });
        if (!res.data) {
            log.error(`League ${leagueId} not found`);
            summary.failures.push({ season: null, endpoint: 'league', url: res.url, message: `League ${leagueId} not found` });
            return undefined;
        }
        writeRaw(rawDir, { endpoint: 'league', season: res.data.season }, res.body);
        return res.data;
    } catch (err) {
        if (!(err instanceof SleeperApiError)) throw err;
        log.error(`Failed to fetch league ${leagueId}`, err);
        summary.failures.push({ season: null, endpoint: 'league', url: err.url, message: err.message });
        return undefined;
    }
}

/**
 * Stores every endpoint of a single season. Returns the league metadata, or
 * undefined when the league itself could not be fetched.
 */
export async function fetchSeason(
    client: SleeperClient,
    rawDir: string,
    leagueId: string,
    summary: FetchSummary = emptySummary()
): Promise<SleeperLeague | undefined> {
    const league = await fetchLeagueInfo(client, rawDir, leagueId, summary);
    if (!league) return undefined;

    const season = league.season;
    log.info(`Fetching ${season} season (league ${leagueId})`);

    for (const endpoint of SEASON_ENDPOINTS) {
        await fetchAndStore(client, rawDir, { endpoint, leagueId }, { endpoint, season }, summary, season);
    }

    const drafts = await fetchAndStore(
        client,
        rawDir,
        { endpoint: 'drafts', leagueId },
        { endpoint: 'drafts', season },
        summary,
        season
    );

    for (const draft of drafts ?? []) {
        if (!draft.draft_id) continue;
        await fetchAndStore(
            client,
            rawDir,
            { endpoint: 'draft_picks', draftId: draft.draft_id },
            { endpoint: 'draft_picks', season, draftId: draft.draft_id },
            summary,
            season
        );
    }

    const lastWeek = league.settings?.last_scored_leg ?? 0;
    for (let week = 1; week <= lastWeek; week++) {
        for (const endpoint of ['matchups', 'transactions'] as const) {
            await fetchAndStore(client, rawDir, { endpoint, leagueId, week }, { endpoint, season, week }, summary, season);
        }
    }

    summary.seasons.push(season);
    return league;
}

function previousLeagueId(league: SleeperLeague): string | undefined {
    const id = league.previous_league_id;
    return id && id !== '0' ? id : undefined;
}

/**
 * Fetches the given season and walks previous_league_id back through every
 * earlier season of the league.
 */
export async function fetchLeagueHistory(client: SleeperClient, rawDir: string, leagueId: string): Promise<FetchSummary> {
    const summary = emptySummary();
    const visited = new Set<string>();
    let next: string | undefined = leagueId;

    while (next && !visited.has(next)) {
        visited.add(next);
        const league = await fetchSeason(client, rawDir, next, summary);
        if (!league) break;
        next = previousLeagueId(league);
        log.info(`Season: ${league.season}, previous league: ${next ?? 'none'}`);
    }

    log.info(`Fetched ${summary.seasons.length} season(s) with ${summary.failures.length} failed request(s)`);
    return summary;
}

/**
 * Stores the full player index. Sleeper asks that this is called at most once
 * a day. Returns the number of players, or undefined when the call failed.
 */
export async function importPlayers(client: SleeperClient, rawDir: string): Promise<number | undefined> {
    const summary = emptySummary();
    const players = await fetchAndStore(client, rawDir, { endpoint: 'players' }, { endpoint: 'players' }, summary, null);
    if (!players) return undefined;
    const count = Object.keys(players).length;
    log.info(`Saved ${count} players`);
    return count;
}
