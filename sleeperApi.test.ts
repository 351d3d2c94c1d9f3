import { describe, it, expect } from 'vitest';
import axios from 'axios';
import { createSleeperClient, endpointPath } from './sleeperApi';
import { SleeperApiError } from './errors';
import { fakeHttp } from './testUtils';

const BASE = 'https://sleeper.test/v1';

describe('endpointPath', () => {
    it('builds league, weekly, draft and player paths', () => {
        expect(endpointPath({ endpoint: 'league', leagueId: 'L1' })).toBe('/league/L1');
        expect(endpointPath({ endpoint: 'rosters', leagueId: 'L1' })).toBe('/league/L1/rosters');
        expect(endpointPath({ endpoint: 'winners_bracket', leagueId: 'L1' })).toBe('/league/L1/winners_bracket');
        expect(endpointPath({ endpoint: 'drafts', leagueId: 'L1' })).toBe('/league/L1/drafts');
        expect(endpointPath({ endpoint: 'matchups', leagueId: 'L1', week: 3 })).toBe('/league/L1/matchups/3');
        expect(endpointPath({ endpoint: 'transactions', leagueId: 'L1', week: 12 })).toBe('/league/L1/transactions/12');
        expect(endpointPath({ endpoint: 'draft_picks', draftId: 'D9' })).toBe('/draft/D9/picks');
        expect(endpointPath({ endpoint: 'players' })).toBe('/players/nfl');
    });
});

describe('createSleeperClient', () => {
    it('returns the body exactly as received next to the parsed data', async () => {
        const url = `${BASE}/league/L1/users`;
        const body = '[ {"user_id": "u1",  "display_name": "alice"} ]\n';
        const { http, calls } = fakeHttp({ [url]: { body } });
        const client = createSleeperClient({ baseUrl: `${BASE}/`, http });

        const res = await client.fetchRaw({ endpoint: 'users', leagueId: 'L1' });

        expect(calls).toEqual([url]);
        expect(res.url).toBe(url);
        expect(res.body.toString('utf8')).toBe(body);
        expect(res.data).toEqual([{ user_id: 'u1', display_name: 'alice' }]);
    });

    it('keeps a byte order mark and invalid UTF-8 in the stored bytes', async () => {
        const url = `${BASE}/league/L1/users`;
        const bytes = Buffer.concat([
            Buffer.from([0xef, 0xbb, 0xbf]),
            Buffer.from('[{"user_id":"u1","display_name":"', 'utf8'),
            Buffer.from([0xff]),
            Buffer.from('"}]', 'utf8'),
        ]);
        const { http } = fakeHttp({ [url]: { body: bytes } });
        const client = createSleeperClient({ baseUrl: BASE, http });

        const res = await client.fetchRaw({ endpoint: 'users', leagueId: 'L1' });

        expect(res.body.length).toBe(bytes.length);
        expect(res.body.equals(bytes)).toBe(true);
        expect(res.data).toEqual([{ user_id: 'u1', display_name: '\uFFFD' }]);
    });

    it('parses a null body', async () => {
        const { http } = fakeHttp({ [`${BASE}/league/L1`]: { body: 'null' } });
        const client = createSleeperClient({ baseUrl: BASE, http });

        const res = await client.fetchRaw({ endpoint: 'league', leagueId: 'L1' });

        expect(res.data).toBeNull();
    });

    it('rejects a non-200 response with the status code', async () => {
        const url = `${BASE}/league/L1/rosters`;
        const { http } = fakeHttp({ [url]: { status: 500, statusText: 'Internal Server Error', body: 'oops' } });
        const client = createSleeperClient({ baseUrl: BASE, http });

        const err = await client.fetchRaw({ endpoint: 'rosters', leagueId: 'L1' }).catch((e: unknown) => e);

        expect(err).toBeInstanceOf(SleeperApiError);
        expect(err).toMatchObject({
            message: `HTTP 500 Internal Server Error for ${url}`,
            url,
            statusCode: 500,
        });
    });

    it('rejects an unknown url with a 404', async () => {
        const { http } = fakeHttp({});
        const client = createSleeperClient({ baseUrl: BASE, http });

        await expect(client.fetchRaw({ endpoint: 'users', leagueId: 'nope' })).rejects.toMatchObject({
            name: 'SleeperApiError',
            statusCode: 404,
            message: `HTTP 404 Not Found for ${BASE}/league/nope/users`,
        });
    });

    it('rejects a body that is not JSON', async () => {
        const url = `${BASE}/players/nfl`;
        const { http } = fakeHttp({ [url]: { body: '<html>maintenance</html>' } });
        const client = createSleeperClient({ baseUrl: BASE, http });

        const err = await client.fetchRaw({ endpoint: 'players' }).catch((e: unknown) => e);

        expect(err).toBeInstanceOf(SleeperApiError);
        expect(err).toMatchObject({ url, statusCode: 200 });
        expect(err instanceof Error && err.message.startsWith(`Response from ${url} is not valid JSON`)).toBe(true);
    });

    it('wraps a transport failure', async () => {
        const http = axios.create({
            adapter: async () => {
                throw new Error('socket hang up');
            },
        });
        const client = createSleeperClient({ baseUrl: BASE, http });

        const err = await client.fetchRaw({ endpoint: 'drafts', leagueId: 'L1' }).catch((e: unknown) => e);

        expect(err).toBeInstanceOf(SleeperApiError);
        expect(err).toMatchObject({
            message: `Request to ${BASE}/league/L1/drafts failed: socket hang up`,
            statusCode: undefined,
        });
    });
});
