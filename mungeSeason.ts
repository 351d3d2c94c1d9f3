import fs from 'fs';
import type { SleeperLeague } from './sleeper-league';
import type { SleeperTransaction } from './sleeper-transaction';
import type { SeasonInfo } from './season-model';
import type { StandingRow } from './standings-model';
import { listRawSeasons, listRawWeeks, rawFilePath, readRaw } from './rawStore';
import type { MungedFile } from './mungedStore';
import { mungedFilePath, mungedSeasonDir } from './mungedStore';
import { buildPlayerIndex, buildRosterIndex, buildUserIndex } from './lookups';
import { mungeRosters } from './mungeRosters';
import { mungeTransactions } from './mungeTransactions';
import { buildWeeklyRecap } from './mungeMatchups';
import type { WeekMatchups } from './standings';
import { buildSeasonScoreTable, computeStandings } from './standings';
import { mungeDraft } from './mungeDraft';
import { mungeBracket } from './mungeBrackets';
import { writeJson } from './jsonFiles';
import { DataFileError, errorMessage } from './errors';
import { DEFAULT_LAST_SCORED_LEG, DEFAULT_PLAYOFF_WEEK_START } from './config';
import { getLogger } from './logger';

const log = getLogger('munge');

/**
 * Rebuilds every munged file of a season from the raw snapshot. The season's
 * munged directory is replaced wholesale, so the output depends on nothing but
 * the raw files.
 */
export function mungeSeason(season: string, rawDir: string, mungedDir: string): SeasonInfo {
    const league = readRaw(rawDir, { endpoint: 'league', season });
    if (!league) {
        const file = rawFilePath(rawDir, { endpoint: 'league', season });
        throw new DataFileError(`No league info for ${season} at ${file}`, file);
    }

    const settings: SleeperLeague['settings'] = league.settings ?? {};
    const playoffWeekStart = settings.playoff_week_start || DEFAULT_PLAYOFF_WEEK_START;
    const lastScoredWeek = settings.last_scored_leg ?? DEFAULT_LAST_SCORED_LEG;
    const rosterPositions = league.roster_positions ?? [];

    const rawPlayers = readRaw(rawDir, { endpoint: 'players' });
    if (!rawPlayers) log.warn('No player index found; players will show by id (run the player import first)');
    const players = buildPlayerIndex(rawPlayers);
    const users = buildUserIndex(readRaw(rawDir, { endpoint: 'users', season }));
    const rawRosters = readRaw(rawDir, { endpoint: 'rosters', season });
    const rosters = buildRosterIndex(rawRosters, users);
    log.info(`Loaded ${players.size} players, ${users.size} users, ${rosters.size} rosters for ${season}`);

    fs.rmSync(mungedSeasonDir(mungedDir, season), { recursive: true, force: true });
    const write = (target: MungedFile, data: unknown) => writeJson(mungedFilePath(mungedDir, season, target), data);

    write({ file: 'rosters' }, mungeRosters(rawRosters, rosters, players));

    const rawDrafts = readRaw(rawDir, { endpoint: 'drafts', season });
    const drafts = Array.isArray(rawDrafts) ? rawDrafts : [];
    write({ file: 'draft' }, drafts
        .filter(d => d && d.draft_id)
        .map(d => mungeDraft(d, readRaw(rawDir, { endpoint: 'draft_picks', season, draftId: d.draft_id }), users, players)));

    const weeks = listRawWeeks(rawDir, season).filter(week => week <= lastScoredWeek);
    const regularSeasonWeeks: number[] = [];
    const postseasonWeeks: number[] = [];
    const regularMatchups: WeekMatchups[] = [];
    const allMatchups: WeekMatchups[] = [];
    const regularTransactions: SleeperTransaction[] = [];
    let standings: StandingRow[] = computeStandings([], rosters);

    for (const week of weeks) {
        const matchups = readRaw(rawDir, { endpoint: 'matchups', season, week });
        if (!Array.isArray(matchups)) {
            log.info(`  Week ${week}: no matchups file, skipping`);
            continue;
        }
        const rawTransactions = readRaw(rawDir, { endpoint: 'transactions', season, week });
        const transactions = Array.isArray(rawTransactions) ? rawTransactions : [];
        const postseason = week >= playoffWeekStart;
        const phase = postseason ? 'postseason' : 'regular_season';
        allMatchups.push({ week, matchups });

        if (!postseason) {
            regularMatchups.push({ week, matchups });
            regularTransactions.push(...transactions);
            standings = computeStandings(regularMatchups, rosters, regularTransactions);
            regularSeasonWeeks.push(week);
        } else {
            postseasonWeeks.push(week);
        }

        const recap = buildWeeklyRecap({
            season,
            week,
            postseason,
            matchups,
            players,
            rosters,
            rosterPositions,
            standings: postseason ? [] : standings,
        });
        write({ file: 'recap', phase, week }, recap);
        write({ file: 'transactions', phase, week }, mungeTransactions(transactions, week, players, rosters));
        log.debug(`  Week ${week}: ${recap.matchups.length} matchups, ${transactions.length} transactions`);
    }

    write({ file: 'standings', phase: 'regular_season' }, standings);
    write({ file: 'season_scores' }, buildSeasonScoreTable(allMatchups, rosters));

    const winners = readRaw(rawDir, { endpoint: 'winners_bracket', season });
    const losers = readRaw(rawDir, { endpoint: 'losers_bracket', season });
    if (winners || losers) {
        write({ file: 'brackets', phase: 'postseason' }, {
            winners: mungeBracket(winners, rosters),
            losers: mungeBracket(losers, rosters),
        });
    }

    const info: SeasonInfo = {
        season,
        leagueId: league.league_id ?? '',
        leagueName: league.name ?? '',
        playoffWeekStart,
        lastScoredWeek,
        rosterPositions,
        regularSeasonWeeks,
        postseasonWeeks,
    };
    write({ file: 'league' }, info);

    log.info(`Munged ${season}: ${regularSeasonWeeks.length} regular season and ${postseasonWeeks.length} postseason week(s)`);
    return info;
}

/**
 * Munges every stored season. A season that fails is logged and skipped.
 */
export function mungeAllSeasons(rawDir: string, mungedDir: string): string[] {
    const done: string[] = [];
    for (const season of listRawSeasons(rawDir)) {
        try {
            mungeSeason(season, rawDir, mungedDir);
            done.push(season);
        } catch (err) {
            log.error(`Error munging season ${season}: ${errorMessage(err)}. Continuing with next season.`);
        }
    }
    return done;
}
