import { describe, it, expect } from 'vitest';
import { buildPlayerIndex, buildUserIndex } from './lookups';
import { mungeDraft } from './mungeDraft';
import type { SleeperDraftPick } from './sleeper-draft';

const users = buildUserIndex([
    { user_id: 'u1', display_name: 'alice', metadata: { team_name: 'Gridiron Gang' } },
    { user_id: 'u2', display_name: 'bob' },
]);
const players = buildPlayerIndex({
    '1001': { player_id: '1001', full_name: 'Alpha Passer', position: 'QB' },
    '2001': { player_id: '2001', full_name: 'Echo Arm', position: 'QB' },
    '1002': { player_id: '1002', full_name: 'Bravo Runner', position: 'RB' },
});

const picks: SleeperDraftPick[] = [
    { round: 1, pick_no: 2, draft_slot: 2, player_id: '2001', picked_by: 'u2', metadata: { position: 'QB' } },
    { round: 2, pick_no: 4, draft_slot: 1, player_id: '1002', picked_by: 'u1', metadata: { position: 'RB' } },
    { round: 1, pick_no: 1, draft_slot: 1, player_id: '1001', picked_by: 'u1', metadata: { position: 'QB' } },
    { round: 1, pick_no: 3, draft_slot: 3, player_id: '9999', picked_by: 'u9', metadata: { first_name: 'Zulu', last_name: 'Kick', position: 'K' } },
    { round: 2, pick_no: 5, draft_slot: 3, player_id: '8888', picked_by: '', metadata: null },
];

describe('mungeDraft', () => {
    it('groups picks by team in draft-slot order', () => {
        const board = mungeDraft(
            { draft_id: 'd1', season: '2024', draft_order: { u1: 1, u2: 2 } },
            picks,
            users,
            players
        );

        expect(board.draftId).toBe('d1');
        expect(board.season).toBe('2024');
        expect(board.teams.map(t => [t.draftSlot, t.teamName])).toEqual([
            [1, 'Gridiron Gang'],
            [2, 'Team bob'],
            [3, 'Team u9'],
        ]);
        expect(board.teams[0].picks).toEqual([
            { round: 1, pickNo: 1, playerId: '1001', playerName: 'Alpha Passer', position: 'QB' },
            { round: 2, pickNo: 4, playerId: '1002', playerName: 'Bravo Runner', position: 'RB' },
        ]);
    });

    it('names players missing from the index from the pick metadata', () => {
        const board = mungeDraft({ draft_id: 'd1', season: '2024', draft_order: null }, picks, users, players);

        expect(board.teams.find(t => t.teamName === 'Team u9')?.picks).toEqual([
            { round: 1, pickNo: 3, playerId: '9999', playerName: 'Zulu Kick', position: 'K' },
        ]);
    });

    it('handles a draft without picks', () => {
        expect(mungeDraft({ draft_id: 'd2', season: '2025' }, undefined, users, players).teams).toEqual([]);
    });
});
