import { describe, it, expect } from 'vitest';
import { buildPlayerIndex, buildRosterIndex, buildUserIndex } from './lookups';
import { buildLeagueLineups, buildWeeklyRecap, efficiency, mungeMatchups } from './mungeMatchups';
import type { SleeperMatchup } from './sleeper-matchup';
import type { SleeperRoster } from './sleeper-roster';

function roster(rosterId: number): SleeperRoster {
    return {
        roster_id: rosterId,
        owner_id: null,
        league_id: 'L1',
        players: [],
        starters: [],
        reserve: null,
        settings: { wins: 0, losses: 0, ties: 0, fpts: 0 },
    };
}

function entry(rosterId: number, matchupId: number | null, points: number): SleeperMatchup {
    return { roster_id: rosterId, matchup_id: matchupId, points, starters: [], players: [] };
}

const rosters = buildRosterIndex([1, 2, 3, 4, 5, 6, 7].map(roster), buildUserIndex([]));

const players = buildPlayerIndex({
    q1: { player_id: 'q1', full_name: 'Quinn One', position: 'QB' },
    r1: { player_id: 'r1', full_name: 'Rory One', position: 'RB' },
    r2: { player_id: 'r2', full_name: 'Rory Two', position: 'RB' },
    w1: { player_id: 'w1', full_name: 'Wes One', position: 'WR' },
    q2: { player_id: 'q2', full_name: 'Quinn Two', position: 'QB' },
    r3: { player_id: 'r3', full_name: 'Rory Three', position: 'RB' },
    w2: { player_id: 'w2', full_name: 'Wes Two', position: 'WR' },
});

// m1 is decided, m2 is a tie, m3 is decided, roster 7 has a bye
const week: SleeperMatchup[] = [
    entry(5, 3, 50),
    entry(1, 1, 35),
    entry(3, 2, 30),
    entry(7, null, 60),
    entry(2, 1, 45),
    entry(4, 2, 30),
    entry(6, 3, 44.5),
];

describe('mungeMatchups', () => {
    it('pairs entries by matchup id and keeps byes', () => {
        const records = mungeMatchups(week, 4, players, rosters);

        expect(records.map(r => [r.matchupId, r.home.rosterId, r.away?.rosterId ?? null, r.winnerRosterId, r.margin])).toEqual([
            [1, 1, 2, 2, 10],
            [2, 3, 4, null, 0],
            [3, 5, 6, 5, 5.5],
            [null, 7, null, null, 0],
        ]);
        expect(records[0].week).toBe(4);
        expect(records[0].home.teamName).toBe('Roster 1');
    });

    it('splits starters from bench with their points', () => {
        const [record] = mungeMatchups([{
            roster_id: 1,
            matchup_id: null,
            points: 35,
            starters: ['q1', 'r1', 'w1'],
            starters_points: [20, 10, 5],
            players: ['w1', 'r2', 'q1', 'r1'],
            players_points: { q1: 20, r1: 10, w1: 5, r2: 15 },
        }], 1, players, rosters);

        expect(record.home.starters.map(p => [p.name, p.points])).toEqual([['Quinn One', 20], ['Rory One', 10], ['Wes One', 5]]);
        expect(record.home.bench.map(p => [p.name, p.points])).toEqual([['Rory Two', 15]]);
    });
});

describe('buildWeeklyRecap', () => {
    it('computes the weekly result awards', () => {
        const recap = buildWeeklyRecap({
            season: '2024',
            week: 4,
            postseason: false,
            matchups: week,
            players,
            rosters,
            rosterPositions: [],
            standings: [],
        });

        expect(recap.highestScoringTeam).toEqual({ rosterId: 7, teamName: 'Roster 7', points: 60 });
        expect(recap.lowestScoringTeam).toEqual({ rosterId: 3, teamName: 'Roster 3', points: 30 });
        expect(recap.awards.highestPointsInLoss).toEqual({ rosterId: 6, teamName: 'Roster 6', points: 44.5, opponentPoints: 50, margin: -5.5 });
        expect(recap.awards.lowestPointsInWin).toEqual({ rosterId: 2, teamName: 'Roster 2', points: 45, opponentPoints: 35, margin: 10 });
        expect(recap.awards.largestWinningMargin?.rosterId).toBe(2);
        expect(recap.awards.smallestWinningMargin).toEqual({ rosterId: 5, teamName: 'Roster 5', points: 50, opponentPoints: 44.5, margin: 5.5 });
        expect(recap.awards.mostEfficientManager).toBeNull();
        expect(recap.awards.leastEfficientManager).toBeNull();
    });

    it('has no awards for an empty week', () => {
        const recap = buildWeeklyRecap({
            season: '2024',
            week: 18,
            postseason: true,
            matchups: undefined,
            players,
            rosters,
            rosterPositions: ['QB'],
            standings: [],
        });

        expect(recap.matchups).toEqual([]);
        expect(recap.highestScoringTeam).toBeNull();
        expect(recap.awards.highestPointsInLoss).toBeNull();
        expect(recap.awards.mostEfficientManager).toBeNull();
    });

    it('picks the most and least efficient managers', () => {
        const positions = ['QB', 'RB', 'FLEX', 'BN'];
        const matchups: SleeperMatchup[] = [
            {
                roster_id: 1, matchup_id: 1, points: 35,
                starters: ['q1', 'r1', 'w1'], starters_points: [20, 10, 5],
                players: ['q1', 'r1', 'w1', 'r2'], players_points: { q1: 20, r1: 10, w1: 5, r2: 15 },
            },
            {
                roster_id: 2, matchup_id: 1, points: 45,
                starters: ['q2', 'r3', 'w2'], starters_points: [25, 12, 8],
                players: ['q2', 'r3', 'w2'], players_points: { q2: 25, r3: 12, w2: 8 },
            },
        ];

        expect(efficiency(matchups[0], players, rosters, positions)).toEqual({
            rosterId: 1, teamName: 'Roster 1', actualPoints: 35, optimalPoints: 45, pointsLeftOnBench: 10,
        });

        const recap = buildWeeklyRecap({
            season: '2024', week: 1, postseason: false, matchups, players, rosters, rosterPositions: positions, standings: [],
        });

        expect(recap.awards.mostEfficientManager?.rosterId).toBe(2);
        expect(recap.awards.mostEfficientManager?.pointsLeftOnBench).toBe(0);
        expect(recap.awards.leastEfficientManager?.rosterId).toBe(1);
    });

    it('leaves teams without per-player points out of the efficiency awards', () => {
        const positions = ['QB', 'RB', 'FLEX', 'BN'];
        const matchups: SleeperMatchup[] = [
            {
                roster_id: 1, matchup_id: 1, points: 35,
                starters: ['q1', 'r1', 'w1'], starters_points: [20, 10, 5],
                players: ['q1', 'r1', 'w1', 'r2'], players_points: { q1: 20, r1: 10, w1: 5, r2: 15 },
            },
            { roster_id: 2, matchup_id: 1, points: 50, starters: ['q2', 'r3', 'w2'], players: ['q2', 'r3', 'w2'] },
        ];

        const recap = buildWeeklyRecap({
            season: '2015', week: 1, postseason: false, matchups, players, rosters, rosterPositions: positions, standings: [],
        });

        expect(recap.awards.mostEfficientManager?.rosterId).toBe(1);
        expect(recap.awards.leastEfficientManager?.rosterId).toBe(1);
    });
});

describe('buildLeagueLineups', () => {
    const positions = ['QB', 'RB', 'FLEX', 'BN'];
    const matchups: SleeperMatchup[] = [
        {
            roster_id: 1, matchup_id: 1, points: 35,
            starters: ['q1', 'r1', 'w1'], starters_points: [20, 10, 5],
            players: ['q1', 'r1', 'w1', 'r2'], players_points: { q1: 20, r1: 10, w1: 5, r2: 15 },
        },
        {
            roster_id: 2, matchup_id: 1, points: 45,
            starters: ['q2', 'r3', 'w2'], starters_points: [25, 12, 8],
            players: ['q2', 'r3', 'w2'], players_points: { q2: 25, r3: 12, w2: 8 },
        },
    ];

    it('builds the best lineup from every rostered player', () => {
        const { highestScoringStarters } = buildLeagueLineups(matchups, players, positions);

        expect(highestScoringStarters.slots.map(s => [s.slot, s.player.playerId, s.player.points])).toEqual([
            ['QB', 'q2', 25],
            ['RB', 'r2', 15],
            ['FLEX', 'r3', 12],
        ]);
        expect(highestScoringStarters.totalPoints).toBe(52);
    });

    it('builds the worst lineup from players who started', () => {
        const { lowestScoringStarters } = buildLeagueLineups(matchups, players, positions);

        expect(lowestScoringStarters.slots.map(s => [s.slot, s.player.playerId])).toEqual([
            ['QB', 'q1'],
            ['RB', 'r1'],
            ['FLEX', 'w1'],
        ]);
        expect(lowestScoringStarters.totalPoints).toBe(35);
    });

    it('keeps bench players who outscored a starter at their position', () => {
        const { benchwarmers } = buildLeagueLineups(matchups, players, positions);

        expect(benchwarmers.slots.map(s => [s.slot, s.player.playerId])).toEqual([
            ['QB', '0'],
            ['RB', 'r2'],
            ['FLEX', '0'],
        ]);
        expect(benchwarmers.totalPoints).toBe(15);
    });

    it('lets a flex player on the bench replace any flex starter', () => {
        const { benchwarmers } = buildLeagueLineups([{
            roster_id: 1, matchup_id: 1, points: 30,
            starters: ['q1', 'r1'], starters_points: [20, 10],
            players: ['q1', 'r1', 'w1', 'q2'], players_points: { q1: 20, r1: 10, w1: 12, q2: 15 },
        }], players, ['QB', 'RB', 'WR']);

        expect(benchwarmers.slots.map(s => [s.slot, s.player.playerId])).toEqual([
            ['QB', '0'],
            ['RB', '0'],
            ['WR', 'w1'],
        ]);
        expect(benchwarmers.totalPoints).toBe(12);
    });

    it('skips empty starting slots', () => {
        const { lowestScoringStarters } = buildLeagueLineups([{
            roster_id: 1, matchup_id: 1, points: 20,
            starters: ['q1', '0'], starters_points: [20, 0],
            players: ['q1'], players_points: { q1: 20 },
        }], players, ['QB', 'RB']);

        expect(lowestScoringStarters.slots.map(s => s.player.playerId)).toEqual(['q1', '0']);
        expect(lowestScoringStarters.totalPoints).toBe(20);
    });
});
