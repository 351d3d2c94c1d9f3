import type { SleeperMatchup } from './sleeper-matchup';
import type { ScoredPlayer } from './player-model';
import type { StandingRow } from './standings-model';
import type {
    EfficiencyAward,
    LeagueLineups,
    MatchupRecord,
    MatchupSide,
    ResultAward,
    TeamScore,
    WeeklyAwards,
    WeeklyRecap,
} from './matchup-model';
import type { PlayerIndex, RosterIndex } from './lookups';
import { EMPTY_SLOT_ID, resolvePlayer, teamName } from './lookups';
import { groupMatchupsById, matchupPoints } from './standings';
import { computeIdealRoster, isFlexEligible } from './computeIdealRoster';
import { round, sum } from './mathUtils';

function scored(id: string, points: number | undefined, players: PlayerIndex): ScoredPlayer {
    return { ...resolvePlayer(id, players), points: typeof points === 'number' ? points : 0 };
}

export function buildSide(entry: SleeperMatchup, players: PlayerIndex, rosters: RosterIndex): MatchupSide {
    const playersPoints = entry.players_points ?? {};
    const startersPoints = entry.starters_points ?? [];
    const starters = entry.starters ?? [];
    const starterIds = new Set(starters);
    const bench = (entry.players ?? []).filter(id => !starterIds.has(id)).sort();

    return {
        rosterId: entry.roster_id,
        teamName: teamName(entry.roster_id, rosters),
        points: round(matchupPoints(entry)),
        starters: starters.map((id, i) => scored(id, playersPoints[id] ?? startersPoints[i], players)),
        bench: bench.map(id => scored(id, playersPoints[id], players)),
    };
}

function headToHead(week: number, matchupId: number, home: MatchupSide, away: MatchupSide): MatchupRecord {
    const winnerRosterId = home.points > away.points ? home.rosterId : away.points > home.points ? away.rosterId : null;
    return { week, matchupId, home, away, winnerRosterId, margin: round(Math.abs(home.points - away.points)) };
}

function bye(week: number, matchupId: number | null, home: MatchupSide): MatchupRecord {
    return { week, matchupId, home, away: null, winnerRosterId: null, margin: 0 };
}

/**
 * Pairs entries sharing a matchup_id into head-to-head records. Entries
 * without an id or without exactly one opponent come out as byes.
 */
export function mungeMatchups(
    matchups: SleeperMatchup[] | undefined,
    week: number,
    players: PlayerIndex,
    rosters: RosterIndex
): MatchupRecord[] {
    const entries = (matchups ?? []).filter(m => m && typeof m.roster_id === 'number');
    const records: MatchupRecord[] = [];

    for (const [matchupId, group] of groupMatchupsById(entries)) {
        const sides = group.map(entry => buildSide(entry, players, rosters));
        if (sides.length === 2) records.push(headToHead(week, matchupId, sides[0], sides[1]));
        else sides.forEach(side => records.push(bye(week, matchupId, side)));
    }
    for (const entry of entries) {
        if (entry.matchup_id === null || entry.matchup_id === undefined) {
            records.push(bye(week, null, buildSide(entry, players, rosters)));
        }
    }

    return records.sort((a, b) =>
        (a.matchupId ?? Number.MAX_SAFE_INTEGER) - (b.matchupId ?? Number.MAX_SAFE_INTEGER) || a.home.rosterId - b.home.rosterId
    );
}

function allSides(records: MatchupRecord[]): MatchupSide[] {
    return records.flatMap(r => (r.away ? [r.home, r.away] : [r.home]));
}

function extreme<T>(items: T[], value: (item: T) => number, better: (a: number, b: number) => boolean): T | null {
    let best: T | null = null;
    let bestValue = 0;
    for (const item of items) {
        const v = value(item);
        if (best === null || better(v, bestValue)) {
            best = item;
            bestValue = v;
        }
    }
    return best;
}

const higher = (a: number, b: number) => a > b;
const lower = (a: number, b: number) => a < b;

function teamScore(side: MatchupSide): TeamScore {
    return { rosterId: side.rosterId, teamName: side.teamName, points: side.points };
}

type Decided = {
    award: ResultAward;
    won: boolean;
};

function decidedResults(records: MatchupRecord[]): Decided[] {
    return records.flatMap(r => {
        const away = r.away;
        if (!away || r.winnerRosterId === null) return [];
        const pairings: [MatchupSide, MatchupSide][] = [[r.home, away], [away, r.home]];
        return pairings.map(([side, opponent]) => ({
            award: {
                ...teamScore(side),
                opponentPoints: opponent.points,
                margin: round(side.points - opponent.points),
            },
            won: side.rosterId === r.winnerRosterId,
        }));
    });
}

function awardOf(result: Decided | null): ResultAward | null {
    return result ? result.award : null;
}

export function efficiency(
    entry: SleeperMatchup,
    players: PlayerIndex,
    rosters: RosterIndex,
    rosterPositions: string[]
): EfficiencyAward {
    const startersPoints = entry.starters_points ?? [];
    const actualPoints = round(startersPoints.length > 0 ? sum(startersPoints) : matchupPoints(entry));
    const optimalPoints = computeIdealRoster(entry.players_points ?? {}, players, rosterPositions).totalPoints;
    return {
        rosterId: entry.roster_id,
        teamName: teamName(entry.roster_id, rosters),
        actualPoints,
        optimalPoints,
        pointsLeftOnBench: round(optimalPoints - actualPoints),
    };
}

export function computeAwards(
    records: MatchupRecord[],
    matchups: SleeperMatchup[],
    players: PlayerIndex,
    rosters: RosterIndex,
    rosterPositions: string[]
): WeeklyAwards {
    const decided = decidedResults(records);
    const winners = decided.filter(r => r.won);
    const losers = decided.filter(r => !r.won);

    // without per-player points there is no optimal lineup to compare against
    const efficiencies = rosterPositions.length > 0
        ? [...matchups]
            .filter(m => m && typeof m.roster_id === 'number')
            .filter(m => Object.keys(m.players_points ?? {}).length > 0)
            .sort((a, b) => a.roster_id - b.roster_id)
            .map(m => efficiency(m, players, rosters, rosterPositions))
        : [];

    return {
        highestPointsInLoss: awardOf(extreme(losers, r => r.award.points, higher)),
        lowestPointsInWin: awardOf(extreme(winners, r => r.award.points, lower)),
        largestWinningMargin: awardOf(extreme(winners, r => r.award.margin, higher)),
        smallestWinningMargin: awardOf(extreme(winners, r => r.award.margin, lower)),
        mostEfficientManager: extreme(efficiencies, e => e.pointsLeftOnBench, lower),
        leastEfficientManager: extreme(efficiencies, e => e.pointsLeftOnBench, higher),
    };
}

function startersOf(entry: SleeperMatchup, players: PlayerIndex): ScoredPlayer[] {
    const playersPoints = entry.players_points ?? {};
    const startersPoints = entry.starters_points ?? [];
    return (entry.starters ?? [])
        .map((id, i) => ({ id, i }))
        .filter(({ id }) => id !== EMPTY_SLOT_ID)
        .map(({ id, i }) => scored(id, playersPoints[id] ?? startersPoints[i], players));
}

function keep(points: Map<string, number>, playerId: string, value: number, better: (a: number, b: number) => boolean): void {
    const current = points.get(playerId);
    if (current === undefined || better(value, current)) points.set(playerId, value);
}

function couldReplace(benchPlayer: ScoredPlayer, starter: ScoredPlayer): boolean {
    if (benchPlayer.positions.some(pos => starter.positions.includes(pos))) return true;
    return isFlexEligible(benchPlayer) && isFlexEligible(starter);
}

/**
 * League-wide lineups for the week: the best lineup anyone rostered, the worst
 * lineup among players who started, and the best lineup of bench players who
 * scored more than a starter on their own team they could have replaced.
 */
export function buildLeagueLineups(
    matchups: SleeperMatchup[],
    players: PlayerIndex,
    rosterPositions: string[]
): LeagueLineups {
    const everyone = new Map<string, number>();
    const starters = new Map<string, number>();
    const benchwarmers = new Map<string, number>();

    for (const entry of matchups.filter(m => m && typeof m.roster_id === 'number')) {
        const playersPoints = entry.players_points ?? {};
        for (const [id, points] of Object.entries(playersPoints)) keep(everyone, id, points, higher);

        const started = startersOf(entry, players);
        for (const p of started) keep(starters, p.playerId, p.points, lower);

        const starterIds = new Set(entry.starters ?? []);
        for (const id of entry.players ?? []) {
            if (starterIds.has(id)) continue;
            const benchPlayer = scored(id, playersPoints[id], players);
            if (started.some(s => s.points < benchPlayer.points && couldReplace(benchPlayer, s))) {
                keep(benchwarmers, id, benchPlayer.points, higher);
            }
        }
    }

    return {
        highestScoringStarters: computeIdealRoster(Object.fromEntries(everyone), players, rosterPositions),
        lowestScoringStarters: computeIdealRoster(Object.fromEntries(starters), players, rosterPositions, 'lowest'),
        benchwarmers: computeIdealRoster(Object.fromEntries(benchwarmers), players, rosterPositions),
    };
}

export type WeeklyRecapInput = {
    season: string;
    week: number;
    postseason: boolean;
    matchups: SleeperMatchup[] | undefined;
    players: PlayerIndex;
    rosters: RosterIndex;
    rosterPositions: string[];
    standings: StandingRow[];
};

export function buildWeeklyRecap(input: WeeklyRecapInput): WeeklyRecap {
    const { season, week, postseason, players, rosters, rosterPositions, standings } = input;
    const matchups = input.matchups ?? [];
    const records = mungeMatchups(matchups, week, players, rosters);
    const sides = allSides(records).sort((a, b) => a.rosterId - b.rosterId);

    const highest = extreme(sides, s => s.points, higher);
    const lowest = extreme(sides, s => s.points, lower);

    return {
        season,
        week,
        postseason,
        matchups: records,
        highestScoringTeam: highest ? teamScore(highest) : null,
        lowestScoringTeam: lowest ? teamScore(lowest) : null,
        awards: computeAwards(records, matchups, players, rosters, rosterPositions),
        lineups: buildLeagueLineups(matchups, players, rosterPositions),
        standings,
    };
}
