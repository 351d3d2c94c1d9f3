import { describe, it, expect } from 'vitest';
import {
    UNKNOWN_OWNER,
    buildPlayerIndex,
    buildRosterIndex,
    buildUserIndex,
    resolvePlayer,
    teamName,
} from './lookups';
import type { SleeperRoster } from './sleeper-roster';

function roster(rosterId: number, ownerId: string | null): SleeperRoster {
    return {
        roster_id: rosterId,
        owner_id: ownerId,
        league_id: 'L1',
        players: [],
        starters: [],
        reserve: null,
        settings: { wins: 0, losses: 0, ties: 0, fpts: 0 },
    };
}

describe('lookups', () => {
    const users = buildUserIndex([
        { user_id: 'u1', display_name: 'alice', metadata: { team_name: 'Gridiron Gang' } },
        { user_id: 'u2', display_name: 'bob', metadata: null },
    ]);

    it('names teams from metadata, falling back to the display name', () => {
        expect(users.get('u1')?.teamName).toBe('Gridiron Gang');
        expect(users.get('u2')?.teamName).toBe('Team bob');
    });

    it('keeps rosters whose owner is missing with placeholder names', () => {
        const rosters = buildRosterIndex([roster(1, 'u1'), roster(2, 'u9'), roster(3, null)], users);

        expect(rosters.get(1)).toEqual({ rosterId: 1, ownerId: 'u1', ownerName: 'alice', teamName: 'Gridiron Gang' });
        expect(rosters.get(2)).toEqual({ rosterId: 2, ownerId: 'u9', ownerName: UNKNOWN_OWNER, teamName: 'Roster 2' });
        expect(rosters.get(3)).toEqual({ rosterId: 3, ownerId: null, ownerName: 'Unknown Owner', teamName: 'Roster 3' });
    });

    it('falls back to a roster placeholder for ids outside the index', () => {
        const rosters = buildRosterIndex([roster(1, 'u1')], users);

        expect(teamName(1, rosters)).toBe('Gridiron Gang');
        expect(teamName(7, rosters)).toBe('Roster 7');
        expect(teamName(null, rosters)).toBe('Unknown');
    });

    it('builds player names and positions', () => {
        const players = buildPlayerIndex({
            '1001': { player_id: '1001', full_name: 'Alpha Passer', position: 'QB', fantasy_positions: ['QB'], team: 'AAA' },
            '1002': { player_id: '1002', full_name: 'Bravo Runner', position: 'RB', fantasy_positions: null, team: null },
            DET: { player_id: 'DET', first_name: 'Detroit', last_name: 'Lions', position: 'DEF', fantasy_positions: ['DEF'], team: 'DET' },
            '9000': null,
        });

        expect(players.size).toBe(3);
        expect(players.get('1001')).toEqual({ playerId: '1001', name: 'Alpha Passer', positions: ['QB'], team: 'AAA', resolved: true });
        expect(players.get('1002')?.positions).toEqual(['RB']);
        expect(players.get('1002')?.team).toBe('');
        expect(players.get('DET')?.name).toBe('Detroit Lions');
    });

    it('resolves unknown ids to a placeholder and "0" to an empty slot', () => {
        const players = buildPlayerIndex({});

        expect(resolvePlayer('5555', players)).toEqual({ playerId: '5555', name: '5555', positions: [], team: '', resolved: false });
        expect(resolvePlayer('0', players)).toEqual({ playerId: '0', name: 'Empty', positions: [], team: '', resolved: true });
    });
});
