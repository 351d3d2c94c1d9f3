import type { SleeperMatchup } from './sleeper-matchup';
import type { SleeperTransaction } from './sleeper-transaction';
import type { SeasonScoreRow, StandingRow } from './standings-model';
import type { RosterIndex } from './lookups';
import { teamName } from './lookups';
import { avg, round, sum } from './mathUtils';

export type WeekMatchups = {
    week: number;
    matchups: SleeperMatchup[];
};

/** Entries that share a matchup_id, in the order the ids first appear. Byes are left out. */
export function groupMatchupsById(matchups: SleeperMatchup[]): Map<number, SleeperMatchup[]> {
    const groups = new Map<number, SleeperMatchup[]>();
    for (const matchup of matchups) {
        const id = matchup.matchup_id;
        if (id === null || id === undefined) continue;
        const group = groups.get(id);
        if (group) group.push(matchup);
        else groups.set(id, [matchup]);
    }
    return groups;
}

export function matchupPoints(matchup: SleeperMatchup): number {
    return typeof matchup.points === 'number' && Number.isFinite(matchup.points) ? matchup.points : 0;
}

type Tally = Omit<StandingRow, 'winPct'>;

function blankTally(rosterId: number, rosters: RosterIndex): Tally {
    return {
        rosterId,
        teamName: teamName(rosterId, rosters),
        wins: 0,
        losses: 0,
        ties: 0,
        pointsFor: 0,
        pointsAgainst: 0,
        transactionCount: 0,
    };
}

/** Wins descending, then points for descending. */
export function sortStandings(rows: StandingRow[]): StandingRow[] {
    return [...rows].sort((a, b) => b.wins - a.wins || b.pointsFor - a.pointsFor || a.rosterId - b.rosterId);
}

/**
 * Cumulative standings over the given weeks. Only head-to-head pairs count
 * toward the record; completed transactions are counted per roster.
 */
export function computeStandings(
    weeks: WeekMatchups[],
    rosters: RosterIndex,
    transactions: SleeperTransaction[] = []
): StandingRow[] {
    const tallies = new Map<number, Tally>();
    const tallyFor = (rosterId: number): Tally => {
        let tally = tallies.get(rosterId);
        if (!tally) {
            tally = blankTally(rosterId, rosters);
            tallies.set(rosterId, tally);
        }
        return tally;
    };
    for (const rosterId of rosters.keys()) tallyFor(rosterId);

    for (const { matchups } of weeks) {
        for (const pair of groupMatchupsById(matchups).values()) {
            if (pair.length !== 2) continue;
            const [a, b] = pair;
            const team1 = tallyFor(a.roster_id);
            const team2 = tallyFor(b.roster_id);
            const points1 = matchupPoints(a);
            const points2 = matchupPoints(b);

            team1.pointsFor += points1;
            team1.pointsAgainst += points2;
            team2.pointsFor += points2;
            team2.pointsAgainst += points1;

            if (points1 > points2) {
                team1.wins++;
                team2.losses++;
            } else if (points2 > points1) {
                team1.losses++;
                team2.wins++;
            } else {
                team1.ties++;
                team2.ties++;
            }
        }
    }

    for (const tx of transactions) {
        if (tx.status !== 'complete') continue;
        for (const rosterId of tx.roster_ids ?? []) {
            const tally = tallies.get(rosterId);
            if (tally) tally.transactionCount++;
        }
    }

    const rows = [...tallies.values()].map((t): StandingRow => {
        const games = t.wins + t.losses + t.ties;
        return {
            ...t,
            winPct: games > 0 ? round(t.wins / games, 4) : 0,
            pointsFor: round(t.pointsFor),
            pointsAgainst: round(t.pointsAgainst),
        };
    });
    return sortStandings(rows);
}

/**
 * Per-roster table of weekly scores across the season. Every matchup entry
 * counts, byes included, so a roster's total is the sum of all its scores.
 */
export function buildSeasonScoreTable(weeks: WeekMatchups[], rosters: RosterIndex): SeasonScoreRow[] {
    const scores = new Map<number, Map<number, number>>();
    const scoresFor = (rosterId: number): Map<number, number> => {
        let weekly = scores.get(rosterId);
        if (!weekly) {
            weekly = new Map();
            scores.set(rosterId, weekly);
        }
        return weekly;
    };
    for (const rosterId of rosters.keys()) scoresFor(rosterId);

    for (const { week, matchups } of weeks) {
        for (const matchup of matchups) {
            if (typeof matchup.roster_id !== 'number') continue;
            const weekly = scoresFor(matchup.roster_id);
            weekly.set(week, (weekly.get(week) ?? 0) + matchupPoints(matchup));
        }
    }

    const rows = [...scores.entries()].map(([rosterId, weekly]): SeasonScoreRow => {
        const ordered = [...weekly.entries()].sort((a, b) => a[0] - b[0]);
        const values = ordered.map(([, points]) => points);
        const total = sum(values);
        const weeklyPoints: Record<string, number> = {};
        for (const [week, points] of ordered) weeklyPoints[String(week)] = round(points);
        return {
            rosterId,
            teamName: teamName(rosterId, rosters),
            weeklyPoints,
            weeksPlayed: values.length,
            totalPoints: round(total),
            averagePoints: round(avg(values)),
            highestWeek: values.length > 0 ? round(Math.max(...values)) : 0,
            lowestWeek: values.length > 0 ? round(Math.min(...values)) : 0,
        };
    });
    return rows.sort((a, b) => b.totalPoints - a.totalPoints || a.rosterId - b.rosterId);
}
