import axios from 'axios';
import type { AxiosInstance, AxiosResponse } from 'axios';
import { SleeperApiError, errorMessage } from './errors';
import type { SleeperLeague } from './sleeper-league';
import type { SleeperUser } from './sleeper-user';
import type { SleeperRoster } from './sleeper-roster';
import type { SleeperMatchup } from './sleeper-matchup';
import type { SleeperTransaction } from './sleeper-transaction';
import type { SleeperBracketMatchup } from './sleeper-bracket';
import type { SleeperDraft, SleeperDraftPick } from './sleeper-draft';
import type { SleeperPlayerIndex } from './sleeper-player';
import { getLogger } from './logger';

const log = getLogger('api');

// Sleeper asks clients to stay under 1000 calls a minute; there is no throttling
// here, a full history fetch is a few hundred calls at most.

export type LeagueEndpoint = 'league' | 'users' | 'rosters' | 'winners_bracket' | 'losers_bracket' | 'drafts';
export type WeeklyEndpoint = 'matchups' | 'transactions';

export type SleeperRequest =
    | { endpoint: LeagueEndpoint; leagueId: string }
    | { endpoint: WeeklyEndpoint; leagueId: string; week: number }
    | { endpoint: 'draft_picks'; draftId: string }
    | { endpoint: 'players' };

export type SleeperEndpoint = SleeperRequest['endpoint'];

export type SleeperResponses = {
    league: SleeperLeague | null;
    users: SleeperUser[];
    rosters: SleeperRoster[];
    winners_bracket: SleeperBracketMatchup[] | null;
    losers_bracket: SleeperBracketMatchup[] | null;
    drafts: SleeperDraft[];
    matchups: SleeperMatchup[];
    transactions: SleeperTransaction[];
    draft_picks: SleeperDraftPick[];
    players: SleeperPlayerIndex;
};

export type RawResponse<T> = {
    url: string;
    body: Buffer; // response bytes exactly as received
    data: T;
};

export function endpointPath(request: SleeperRequest): string {
    switch (request.endpoint) {
        case 'league':
            return `/league/${request.leagueId}`;
        case 'users':
        case 'rosters':
        case 'winners_bracket':
        case 'losers_bracket':
        case 'drafts':
            return `/league/${request.leagueId}/${request.endpoint}`;
        case 'matchups':
        case 'transactions':
            return `/league/${request.leagueId}/${request.endpoint}/${request.week}`;
        case 'draft_picks':
            return `/draft/${request.draftId}/picks`;
        case 'players':
            return '/players/nfl';
    }
}

export type SleeperClientOptions = {
    baseUrl: string;
    http?: AxiosInstance;
};

export type SleeperClient = {
    fetchRaw<R extends SleeperRequest>(request: R): Promise<RawResponse<SleeperResponses[R['endpoint']]>>;
};

function toBuffer(data: unknown): Buffer {
    if (Buffer.isBuffer(data)) return data;
    if (data instanceof ArrayBuffer) return Buffer.from(data);
    if (typeof data === 'string') return Buffer.from(data, 'utf8');
    return Buffer.from(JSON.stringify(data) ?? '', 'utf8');
}

/** Response text with a leading byte order mark dropped, ready for JSON.parse. */
export function decodeBody(body: Buffer): string {
    return body.toString('utf8').replace(/^\uFEFF/, '');
}

export function createSleeperClient(options: SleeperClientOptions): SleeperClient {
    const baseUrl = options.baseUrl.replace(/\/+$/, '');
    const http = options.http ?? axios.create({ headers: { Accept: 'application/json' } });

    async function fetchRaw<R extends SleeperRequest>(request: R): Promise<RawResponse<SleeperResponses[R['endpoint']]>> {
        const url = `${baseUrl}${endpointPath(request)}`;
        log.debug(`GET ${url}`);

        let res: AxiosResponse<unknown>;
        try {
            res = await http.get<unknown>(url, {
                responseType: 'arraybuffer',
                // keep the bytes untouched; they are parsed below and stored as-is
                transformResponse: [(data: unknown) => data],
                validateStatus: () => true,
            });
        } catch (err) {
            throw new SleeperApiError(`Request to ${url} failed: ${errorMessage(err)}`, url);
        }

        if (res.status !== 200) {
            throw new SleeperApiError(`HTTP ${res.status} ${res.statusText || ''}`.trim() + ` for ${url}`, url, res.status);
        }

        const body = toBuffer(res.data);
        try {
            const data = JSON.parse(decodeBody(body)) as SleeperResponses[R['endpoint']];
            return { url, body, data };
        } catch (err) {
            throw new SleeperApiError(`Response from ${url} is not valid JSON: ${errorMessage(err)}`, url, res.status);
        }
    }

    return { fetchRaw };
}
