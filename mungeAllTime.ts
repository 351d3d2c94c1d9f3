import fs from 'fs';
import path from 'path';
import type { SleeperMatchup } from './sleeper-matchup';
import type { SleeperLeague } from './sleeper-league';
import type {
    AllTimeStandingRow,
    AllTimeStats,
    HeadToHeadRecord,
    HeadToHeadTable,
    MarginMoment,
    PlayerHighScore,
    ScoreMoment,
    WeeklyHighScore,
} from './all-time-model';
import type { PlayerIndex, RosterIndex } from './lookups';
import { EMPTY_SLOT_ID, UNKNOWN_OWNER, buildPlayerIndex, buildRosterIndex, buildUserIndex, resolvePlayer, teamName } from './lookups';
import { listRawSeasons, listRawWeeks, readRaw } from './rawStore';
import { ALL_TIME_DIR, allTimeFilePath } from './mungedStore';
import { groupMatchupsById, matchupPoints } from './standings';
import { avg, median, round, stdDev, sum } from './mathUtils';
import { writeJson } from './jsonFiles';
import { DEFAULT_LAST_SCORED_LEG, DEFAULT_PLAYOFF_WEEK_START } from './config';
import { getLogger } from './logger';

const log = getLogger('all-time');

export const HIGH_SCORE_LIMIT = 10;

type SeasonWeek = {
    week: number;
    postseason: boolean;
    matchups: SleeperMatchup[];
}

type SeasonData = {
    season: string;
    rosters: RosterIndex;
    weeks: SeasonWeek[];
}

// One manager's side of a regular season head-to-head game
type Game = ScoreMoment & {
    userId: string;
    opponentId: string;
    opponentPoints: number;
    weekMedian: number;
    weekHigh: number;
    weekLow: number;
}

function loadSeason(rawDir: string, season: string): SeasonData | undefined {
    const league = readRaw(rawDir, { endpoint: 'league', season });
    if (!league) {
        log.warn(`No league info for ${season}, leaving it out of the all-time stats`);
        return undefined;
    }
    const settings: SleeperLeague['settings'] = league.settings ?? {};
    const playoffWeekStart = settings.playoff_week_start || DEFAULT_PLAYOFF_WEEK_START;
    const lastScoredWeek = settings.last_scored_leg ?? DEFAULT_LAST_SCORED_LEG;

    const users = buildUserIndex(readRaw(rawDir, { endpoint: 'users', season }));
    const rosters = buildRosterIndex(readRaw(rawDir, { endpoint: 'rosters', season }), users);
    const weeks: SeasonWeek[] = [];
    for (const week of listRawWeeks(rawDir, season)) {
        if (week > lastScoredWeek) continue;
        const matchups = readRaw(rawDir, { endpoint: 'matchups', season, week });
        if (!Array.isArray(matchups)) continue;
        weeks.push({ week, postseason: week >= playoffWeekStart, matchups });
    }
    return { season, rosters, weeks };
}

/**
 * Seasons come oldest first, so the newest display name wins. Managers never
 * found in a user list stay Unknown Owner.
 */
function collectManagerNames(seasons: SeasonData[]): Map<string, string> {
    const names = new Map<string, string>();
    for (const { rosters } of seasons) {
        for (const owner of rosters.values()) {
            if (owner.ownerId && owner.ownerName !== UNKNOWN_OWNER) names.set(owner.ownerId, owner.ownerName);
        }
    }
    return names;
}

function collectGames(seasons: SeasonData[]): Game[] {
    const games: Game[] = [];
    for (const { season, rosters, weeks } of seasons) {
        for (const { week, postseason, matchups } of weeks) {
            if (postseason) continue;
            const scores = matchups.map(matchupPoints);
            const weekMedian = median(scores);
            const weekHigh = Math.max(...scores);
            const weekLow = Math.min(...scores);
            for (const pair of groupMatchupsById(matchups).values()) {
                if (pair.length !== 2) continue;
                const [a, b] = pair;
                const ownerA = rosters.get(a.roster_id)?.ownerId;
                const ownerB = rosters.get(b.roster_id)?.ownerId;
                if (!ownerA || !ownerB) continue;
                const pointsA = matchupPoints(a);
                const pointsB = matchupPoints(b);
                const shared = { season, week, weekMedian, weekHigh, weekLow };
                games.push({ ...shared, userId: ownerA, opponentId: ownerB, points: pointsA, opponentPoints: pointsB });
                games.push({ ...shared, userId: ownerB, opponentId: ownerA, points: pointsB, opponentPoints: pointsA });
            }
        }
    }
    return games;
}

function moment(game: Game): ScoreMoment {
    return { points: game.points, season: game.season, week: game.week };
}

function marginMoment(game: Game, names: Map<string, string>): MarginMoment {
    return {
        ...moment(game),
        margin: round(Math.abs(game.points - game.opponentPoints)),
        opponentName: names.get(game.opponentId) ?? UNKNOWN_OWNER,
    };
}

// First game wins a tie, so the earliest occurrence is reported
function pickGame(games: Game[], better: (a: Game, b: Game) => boolean): Game | undefined {
    let best: Game | undefined;
    for (const game of games) {
        if (!best || better(game, best)) best = game;
    }
    return best;
}

function standingRow(userId: string, games: Game[], names: Map<string, string>): AllTimeStandingRow {
    const won = games.filter(g => g.points > g.opponentPoints);
    const lost = games.filter(g => g.points < g.opponentPoints);
    const points = games.map(g => g.points);
    const margin = (g: Game) => Math.abs(g.points - g.opponentPoints);
    const share = (count: number) => (games.length > 0 ? round(count / games.length, 4) : 0);

    const high = pickGame(games, (a, b) => a.points > b.points);
    const low = pickGame(games, (a, b) => a.points < b.points);
    const largestWin = pickGame(won, (a, b) => margin(a) > margin(b));
    const largestLoss = pickGame(lost, (a, b) => margin(a) > margin(b));

    return {
        userId,
        managerName: names.get(userId) ?? UNKNOWN_OWNER,
        seasons: new Set(games.map(g => g.season)).size,
        games: games.length,
        wins: won.length,
        losses: lost.length,
        ties: games.length - won.length - lost.length,
        winPct: share(won.length),
        pointsFor: round(sum(points)),
        pointsAgainst: round(sum(games.map(g => g.opponentPoints))),
        averagePointsFor: round(avg(points)),
        averagePointsAgainst: round(avg(games.map(g => g.opponentPoints))),
        averageMargin: round(avg(games.map(g => g.points - g.opponentPoints))),
        pointsStdDev: round(stdDev(points)),
        highScore: high ? moment(high) : null,
        lowScore: low ? moment(low) : null,
        largestWin: largestWin ? marginMoment(largestWin, names) : null,
        largestLoss: largestLoss ? marginMoment(largestLoss, names) : null,
        medianWinPct: share(games.filter(g => g.points > g.weekMedian).length),
        luckyWins: won.filter(g => g.points < g.weekMedian).length,
        unluckyLosses: lost.filter(g => g.points > g.weekMedian).length,
        topScoreWeeks: games.filter(g => g.points === g.weekHigh).length,
        lowScoreWeeks: games.filter(g => g.points === g.weekLow).length,
    };
}

function gamesByManager(games: Game[]): Map<string, Game[]> {
    const byManager = new Map<string, Game[]>();
    for (const game of games) {
        const list = byManager.get(game.userId) ?? [];
        list.push(game);
        byManager.set(game.userId, list);
    }
    return byManager;
}

/**
 * Career standings per manager, keyed by Sleeper user id so a manager keeps
 * one row across seasons and roster changes. Ordered by win percentage, then
 * points for.
 */
function computeAllTimeStandings(games: Game[], names: Map<string, string>): AllTimeStandingRow[] {
    return [...gamesByManager(games)]
        .map(([userId, list]) => standingRow(userId, list, names))
        .sort((a, b) =>
            b.winPct - a.winPct
            || b.pointsFor - a.pointsFor
            || a.userId.localeCompare(b.userId));
}

function computeHeadToHead(games: Game[], names: Map<string, string>): HeadToHeadTable {
    const records: Record<string, Record<string, HeadToHeadRecord>> = {};
    for (const game of games) {
        const row = records[game.userId] ?? (records[game.userId] = {});
        const record = row[game.opponentId] ?? (row[game.opponentId] = { wins: 0, losses: 0, ties: 0 });
        if (game.points > game.opponentPoints) record.wins++;
        else if (game.points < game.opponentPoints) record.losses++;
        else record.ties++;
    }
    const managers = Object.keys(records)
        .map(userId => ({ userId, managerName: names.get(userId) ?? UNKNOWN_OWNER }))
        .sort((a, b) => a.managerName.localeCompare(b.managerName) || a.userId.localeCompare(b.userId));
    return { managers, records };
}

type Ranked<T> = { entry: T; rosterId: number; playerId: string };

function topScores<T extends ScoreMoment>(ranked: Ranked<T>[]): T[] {
    return ranked
        .sort((a, b) =>
            b.entry.points - a.entry.points
            || Number(a.entry.season) - Number(b.entry.season)
            || a.entry.week - b.entry.week
            || a.rosterId - b.rosterId
            || a.playerId.localeCompare(b.playerId))
        .slice(0, HIGH_SCORE_LIMIT)
        .map(r => r.entry);
}

/** Best team scores of every scored week, postseason included. */
function computeWeeklyHighScores(seasons: SeasonData[], names: Map<string, string>): WeeklyHighScore[] {
    const ranked: Ranked<WeeklyHighScore>[] = [];
    for (const { season, rosters, weeks } of seasons) {
        for (const { week, postseason, matchups } of weeks) {
            for (const m of matchups) {
                const ownerId = rosters.get(m.roster_id)?.ownerId;
                ranked.push({
                    rosterId: m.roster_id,
                    playerId: '',
                    entry: {
                        points: matchupPoints(m),
                        season,
                        week,
                        managerName: (ownerId && names.get(ownerId)) || UNKNOWN_OWNER,
                        teamName: teamName(m.roster_id, rosters),
                        postseason,
                    },
                });
            }
        }
    }
    return topScores(ranked);
}

/** Best single-player scores, bench included, across every scored week. */
function computePlayerHighScores(seasons: SeasonData[], players: PlayerIndex): PlayerHighScore[] {
    const ranked: Ranked<PlayerHighScore>[] = [];
    for (const { season, rosters, weeks } of seasons) {
        for (const { week, matchups } of weeks) {
            for (const m of matchups) {
                const starters = m.starters ?? [];
                for (const [playerId, points] of Object.entries(m.players_points ?? {})) {
                    if (playerId === EMPTY_SLOT_ID || !Number.isFinite(points)) continue;
                    ranked.push({
                        rosterId: m.roster_id,
                        playerId,
                        entry: {
                            points,
                            season,
                            week,
                            player: resolvePlayer(playerId, players),
                            teamName: teamName(m.roster_id, rosters),
                            starter: starters.includes(playerId),
                        },
                    });
                }
            }
        }
    }
    return topScores(ranked);
}

/**
 * Rebuilds <munged>/all_time/ from every stored raw season. The directory is
 * replaced wholesale, so a season removed from raw drops out of the stats.
 */
export function mungeAllTime(rawDir: string, mungedDir: string): AllTimeStats {
    const seasons = listRawSeasons(rawDir)
        .sort((a, b) => Number(a) - Number(b))
        .map(season => loadSeason(rawDir, season))
        .filter((s): s is SeasonData => s !== undefined);
    const players = buildPlayerIndex(readRaw(rawDir, { endpoint: 'players' }));
    const names = collectManagerNames(seasons);
    const games = collectGames(seasons);

    const stats: AllTimeStats = {
        seasons: seasons.map(s => s.season),
        standings: computeAllTimeStandings(games, names),
        headToHead: computeHeadToHead(games, names),
        weeklyHighScores: computeWeeklyHighScores(seasons, names),
        playerHighScores: computePlayerHighScores(seasons, players),
    };

    fs.rmSync(path.join(mungedDir, ALL_TIME_DIR), { recursive: true, force: true });
    writeJson(allTimeFilePath(mungedDir, 'standings'), stats.standings);
    writeJson(allTimeFilePath(mungedDir, 'head_to_head'), stats.headToHead);
    writeJson(allTimeFilePath(mungedDir, 'weekly_high_scores'), stats.weeklyHighScores);
    writeJson(allTimeFilePath(mungedDir, 'player_high_scores'), stats.playerHighScores);

    log.info(`Munged all-time stats: ${stats.seasons.length} season(s), ${stats.standings.length} manager(s), ${games.length / 2} game(s)`);
    return stats;
}
