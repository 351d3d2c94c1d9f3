import fs from 'fs';
import path from 'path';
import type { PlayerRef, ScoredPlayer } from './player-model';
import type { RosterRecord } from './roster-model';
import type { TransactionRow } from './transaction-model';
import type { EfficiencyAward, LeagueLineups, MatchupRecord, MatchupSide, ResultAward, WeeklyRecap } from './matchup-model';
import type { IdealRoster } from './ideal-roster';
import type { SeasonScoreRow, StandingRow } from './standings-model';
import type { DraftBoard } from './draft-model';
import type { BracketRow, PostseasonBrackets } from './bracket-model';
import type { SeasonInfo } from './season-model';
import type { AllTimeStandingRow, HeadToHeadTable, MarginMoment, PlayerHighScore, ScoreMoment, WeeklyHighScore } from './all-time-model';
import type { SeasonPhase } from './mungedStore';
import { ALL_TIME_DIR, allTimeFilePath, listMungedSeasons, mungedFilePath } from './mungedStore';
import { escapeHtml, formatNum, formatPercent, formatRecord, formatTimestamp, renderPage, renderTable } from './html';
import { readJson, writeText } from './jsonFiles';
import { sortStandings } from './standings';
import { EMPTY_SLOT_ID } from './lookups';
import { DataFileError, errorMessage } from './errors';
import { getLogger } from './logger';

const log = getLogger('report');

type WeekPage = {
    week: number;
    phase: SeasonPhase;
    recap: WeeklyRecap;
    transactions: TransactionRow[];
};

export function weekPageName(week: number): string {
    return `week_${week}.html`;
}

function seasonTitle(info: SeasonInfo): string {
    return info.leagueName ? `${info.leagueName} ${info.season}` : `Season ${info.season}`;
}

function playerCell(player: PlayerRef): string {
    const name = escapeHtml(player.name);
    return player.resolved ? name : `${name} <span class="muted">(unknown player)</span>`;
}

export function renderStandingsTable(rows: StandingRow[]): string {
    if (rows.length === 0) return '<p class="muted">No standings yet.</p>';
    return renderTable(
        ['Rank', 'Team', 'Record', 'Win %', 'PF', 'PA', 'Moves'],
        sortStandings(rows).map((r, i) => [
            String(i + 1),
            escapeHtml(r.teamName),
            formatRecord(r.wins, r.losses, r.ties),
            formatPercent(r.winPct),
            formatNum(r.pointsFor),
            formatNum(r.pointsAgainst),
            String(r.transactionCount),
        ]),
        'standings'
    );
}

export function renderSeasonScoresTable(rows: SeasonScoreRow[], weeks: number[]): string {
    if (rows.length === 0) return '<p class="muted">No scores yet.</p>';
    const headers = ['Team', ...weeks.map(w => `Wk ${w}`), 'Total', 'Avg', 'High', 'Low'];
    return renderTable(headers, rows.map(r => [
        escapeHtml(r.teamName),
        ...weeks.map(w => {
            const points = r.weeklyPoints[String(w)];
            return points === undefined ? '-' : formatNum(points);
        }),
        formatNum(r.totalPoints),
        formatNum(r.averagePoints),
        formatNum(r.highestWeek),
        formatNum(r.lowestWeek),
    ]));
}

export function renderRostersSection(rosters: RosterRecord[]): string {
    if (rosters.length === 0) return '<p class="muted">No rosters.</p>';
    const lines: string[] = [];
    for (const r of rosters) {
        const { record } = r;
        lines.push(`<h3>${escapeHtml(r.teamName)}</h3>`);
        lines.push(`<p>Owner: ${escapeHtml(r.ownerName)} | Record: ${formatRecord(record.wins, record.losses, record.ties)}`
            + ` | PF: ${formatNum(record.pointsFor)} | PA: ${formatNum(record.pointsAgainst)} | Max PF: ${formatNum(record.maxPoints)}</p>`);
        const groups: [string, PlayerRef[]][] = [['Starter', r.starters], ['Bench', r.bench], ['IR', r.reserve], ['Taxi', r.taxi]];
        const rows = groups.flatMap(([label, players]) => players.map(p => [
            label,
            playerCell(p),
            escapeHtml(p.positions.join('/')),
            escapeHtml(p.team),
        ]));
        lines.push(renderTable(['Slot', 'Player', 'Pos', 'NFL Team'], rows));
    }
    return lines.join('\n');
}

export function renderTransactionsTable(rows: TransactionRow[]): string {
    if (rows.length === 0) return '<p class="muted">No transactions.</p>';
    return renderTable(['Date', 'Type', 'Status', 'Summary'], rows.map(t => [
        escapeHtml(formatTimestamp(t.createdAt)),
        escapeHtml(t.type.replace(/_/g, ' ')),
        escapeHtml(t.status),
        t.notes ? `${escapeHtml(t.summary)}<br><span class="muted">${escapeHtml(t.notes)}</span>` : escapeHtml(t.summary),
    ]));
}

function resultCell(m: MatchupRecord): string {
    if (!m.away) return 'Bye';
    if (m.winnerRosterId === null) return 'Tie';
    const winner = m.winnerRosterId === m.home.rosterId ? m.home : m.away;
    return `${escapeHtml(winner.teamName)} by ${formatNum(m.margin)}`;
}

function lineupTable(home: MatchupSide, away: MatchupSide | null): string {
    const sides = away ? [home, away] : [home];
    const depth = Math.max(...sides.map(s => s.starters.length));
    const cell = (p: ScoredPlayer | undefined) => p
        ? [`${playerCell(p)} <span class="muted">${escapeHtml(p.positions.join('/'))}</span>`, formatNum(p.points)]
        : ['', ''];
    const rows: string[][] = [];
    for (let i = 0; i < depth; i++) {
        rows.push(sides.flatMap(s => cell(s.starters[i])));
    }
    rows.push(sides.flatMap(s => [`<span class="winner">Total</span>`, `<span class="winner">${formatNum(s.points)}</span>`]));
    return renderTable(sides.flatMap(s => [s.teamName, 'Pts']), rows, 'lineup');
}

export function renderMatchupsSection(matchups: MatchupRecord[]): string {
    if (matchups.length === 0) return '<p class="muted">No matchups.</p>';
    const lines: string[] = [];
    lines.push(renderTable(['Team', 'Pts', 'Opponent', 'Pts', 'Result'], matchups.map(m => [
        escapeHtml(m.home.teamName),
        formatNum(m.home.points),
        m.away ? escapeHtml(m.away.teamName) : '-',
        m.away ? formatNum(m.away.points) : '-',
        resultCell(m),
    ])));
    for (const m of matchups) {
        lines.push(`<h3>${escapeHtml(m.home.teamName)}${m.away ? ` vs ${escapeHtml(m.away.teamName)}` : ' (bye)'}</h3>`);
        lines.push(lineupTable(m.home, m.away));
    }
    return lines.join('\n');
}

export function renderAwardsSection(recap: WeeklyRecap): string {
    const { awards } = recap;
    const items: string[] = [];
    if (recap.highestScoringTeam) {
        items.push(`Highest score: ${escapeHtml(recap.highestScoringTeam.teamName)} (${formatNum(recap.highestScoringTeam.points)})`);
    }
    if (recap.lowestScoringTeam) {
        items.push(`Lowest score: ${escapeHtml(recap.lowestScoringTeam.teamName)} (${formatNum(recap.lowestScoringTeam.points)})`);
    }
    const results: [string, ResultAward | null][] = [
        ['Most points in a loss', awards.highestPointsInLoss],
        ['Fewest points in a win', awards.lowestPointsInWin],
        ['Biggest blowout', awards.largestWinningMargin],
        ['Closest win', awards.smallestWinningMargin],
    ];
    for (const [label, award] of results) {
        if (!award) continue;
        items.push(`${label}: ${escapeHtml(award.teamName)} ${formatNum(award.points)} - ${formatNum(award.opponentPoints)} (margin ${formatNum(award.margin)})`);
    }
    const efficiency: [string, EfficiencyAward | null][] = [
        ['Best manager', awards.mostEfficientManager],
        ['Most points left on the bench', awards.leastEfficientManager],
    ];
    for (const [label, award] of efficiency) {
        if (!award) continue;
        items.push(`${label}: ${escapeHtml(award.teamName)} scored ${formatNum(award.actualPoints)} of an optimal ${formatNum(award.optimalPoints)}`
            + ` (${formatNum(award.pointsLeftOnBench)} left on the bench)`);
    }
    if (items.length === 0) return '<p class="muted">No awards this week.</p>';
    return ['<ul class="awards">', ...items.map(i => `<li>${i}</li>`), '</ul>'].join('\n');
}

function idealRosterTable(lineup: IdealRoster): string {
    const rows = lineup.slots.map(s => [
        escapeHtml(s.slot),
        playerCell(s.player),
        escapeHtml(s.player.positions.join('/')),
        formatNum(s.player.points),
    ]);
    rows.push(['', '<span class="winner">Total</span>', '', `<span class="winner">${formatNum(lineup.totalPoints)}</span>`]);
    return renderTable(['Slot', 'Player', 'Pos', 'Pts'], rows, 'lineup');
}

export function renderLineupsSection(lineups: LeagueLineups): string {
    const sections: [string, IdealRoster][] = [
        ['Highest scoring starters', lineups.highestScoringStarters],
        ['Lowest scoring starters', lineups.lowestScoringStarters],
        ['Benchwarmers', lineups.benchwarmers],
    ];
    const lines: string[] = [];
    for (const [title, lineup] of sections) {
        lines.push(`<h3>${title}</h3>`);
        const filled = lineup.slots.some(s => s.player.playerId !== EMPTY_SLOT_ID);
        lines.push(filled ? idealRosterTable(lineup) : '<p class="muted">Nobody qualified.</p>');
    }
    return lines.join('\n');
}

export function renderDraftSection(boards: DraftBoard[]): string {
    const withPicks = boards.filter(b => b.teams.length > 0);
    if (withPicks.length === 0) return '<p class="muted">No draft picks.</p>';
    const lines: string[] = [];
    for (const board of withPicks) {
        if (withPicks.length > 1) lines.push(`<h3>Draft ${escapeHtml(board.draftId)}</h3>`);
        for (const team of board.teams) {
            lines.push(`<h4>${team.draftSlot > 0 ? `${team.draftSlot}. ` : ''}${escapeHtml(team.teamName)}</h4>`);
            lines.push(renderTable(['Round', 'Pick', 'Player', 'Pos'], team.picks.map(p => [
                String(p.round),
                String(p.pickNo),
                escapeHtml(p.playerName),
                escapeHtml(p.position),
            ])));
        }
    }
    return lines.join('\n');
}

export function renderBracketSection(title: string, rows: BracketRow[]): string {
    const lines: string[] = [];
    lines.push(`<h2>${escapeHtml(title)}</h2>`);
    if (rows.length === 0) {
        lines.push('<p class="muted">No bracket.</p>');
        return lines.join('\n');
    }
    lines.push(renderTable(['Round', 'Match', 'Team 1', 'Team 2', 'Winner', 'Place'], rows.map(b => [
        String(b.round),
        String(b.matchId),
        escapeHtml(b.team1),
        escapeHtml(b.team2),
        b.winner === null ? 'TBD' : escapeHtml(b.winner),
        b.place === null ? '' : String(b.place),
    ])));
    return lines.join('\n');
}

function weekLinks(pages: WeekPage[], hasPostseasonPage: boolean): string {
    const links = pages.map(p => `<a href="${weekPageName(p.week)}">Week ${p.week}${p.phase === 'postseason' ? ' (playoffs)' : ''}</a>`);
    if (hasPostseasonPage) links.push('<a href="postseason.html">Postseason</a>');
    if (links.length === 0) return '<p class="muted">No weeks played yet.</p>';
    return `<div class="week-links">\n${links.join('\n')}\n</div>`;
}

function renderWeekPage(info: SeasonInfo, page: WeekPage, prev: WeekPage | undefined, next: WeekPage | undefined): string {
    const { recap } = page;
    const lines: string[] = [];
    const pager = [`<a href="index.html">${escapeHtml(seasonTitle(info))}</a>`];
    if (prev) pager.push(`<a href="${weekPageName(prev.week)}">&larr; Week ${prev.week}</a>`);
    if (next) pager.push(`<a href="${weekPageName(next.week)}">Week ${next.week} &rarr;</a>`);
    lines.push(`<p class="week-links">${pager.join(' ')}</p>`);
    lines.push(`<h1>${escapeHtml(seasonTitle(info))}: Week ${page.week}${recap.postseason ? ' (playoffs)' : ''}</h1>`);
    lines.push('<h2>Matchups</h2>');
    lines.push(renderMatchupsSection(recap.matchups));
    lines.push('<h2>Awards</h2>');
    lines.push(renderAwardsSection(recap));
    lines.push('<h2>League lineups</h2>');
    lines.push(renderLineupsSection(recap.lineups));
    if (!recap.postseason) {
        lines.push(`<h2>Standings through week ${page.week}</h2>`);
        lines.push(renderStandingsTable(recap.standings));
    }
    lines.push('<h2>Transactions</h2>');
    lines.push(renderTransactionsTable(page.transactions));
    return renderPage({ title: `${seasonTitle(info)} - Week ${page.week}`, body: lines.join('\n'), root: '../' });
}

function renderPostseasonPage(info: SeasonInfo, brackets: PostseasonBrackets | undefined, pages: WeekPage[]): string {
    const lines: string[] = [];
    lines.push(`<p class="week-links"><a href="index.html">${escapeHtml(seasonTitle(info))}</a></p>`);
    lines.push(`<h1>${escapeHtml(seasonTitle(info))}: Postseason</h1>`);
    lines.push(weekLinks(pages.filter(p => p.phase === 'postseason'), false));
    lines.push(renderBracketSection('Winners bracket', brackets?.winners ?? []));
    lines.push(renderBracketSection('Losers bracket', brackets?.losers ?? []));
    return renderPage({ title: `${seasonTitle(info)} - Postseason`, body: lines.join('\n'), root: '../' });
}

/**
 * Renders one munged season into <reports>/<season>/: index.html, a page per
 * processed week and postseason.html when there is anything to show there.
 */
export function generateSeasonReports(season: string, mungedDir: string, reportsDir: string): SeasonInfo {
    const infoFile = mungedFilePath(mungedDir, season, { file: 'league' });
    const info = readJson<SeasonInfo>(infoFile);
    if (!info) throw new DataFileError(`No munged data for ${season} at ${infoFile}; munge the season first`, infoFile);

    const standings = readJson<StandingRow[]>(mungedFilePath(mungedDir, season, { file: 'standings', phase: 'regular_season' })) ?? [];
    const scores = readJson<SeasonScoreRow[]>(mungedFilePath(mungedDir, season, { file: 'season_scores' })) ?? [];
    const rosters = readJson<RosterRecord[]>(mungedFilePath(mungedDir, season, { file: 'rosters' })) ?? [];
    const drafts = readJson<DraftBoard[]>(mungedFilePath(mungedDir, season, { file: 'draft' })) ?? [];
    const brackets = readJson<PostseasonBrackets>(mungedFilePath(mungedDir, season, { file: 'brackets', phase: 'postseason' }));

    const weeks: { week: number; phase: SeasonPhase }[] = [
        ...info.regularSeasonWeeks.map(week => ({ week, phase: 'regular_season' as const })),
        ...info.postseasonWeeks.map(week => ({ week, phase: 'postseason' as const })),
    ];
    const pages: WeekPage[] = [];
    for (const { week, phase } of weeks) {
        const recap = readJson<WeeklyRecap>(mungedFilePath(mungedDir, season, { file: 'recap', phase, week }));
        if (!recap) {
            log.warn(`No recap for ${season} week ${week}, skipping its page`);
            continue;
        }
        const transactions = readJson<TransactionRow[]>(mungedFilePath(mungedDir, season, { file: 'transactions', phase, week })) ?? [];
        pages.push({ week, phase, recap, transactions });
    }
    const hasPostseasonPage = brackets !== undefined || pages.some(p => p.phase === 'postseason');

    const seasonDir = path.join(reportsDir, season);
    fs.rmSync(seasonDir, { recursive: true, force: true });

    const lines: string[] = [];
    lines.push(`<h1>${escapeHtml(seasonTitle(info))}</h1>`);
    lines.push('<h2>Weeks</h2>');
    lines.push(weekLinks(pages, hasPostseasonPage));
    lines.push('<h2>Standings</h2>');
    lines.push(renderStandingsTable(standings));
    lines.push('<h2>Season scores</h2>');
    lines.push(renderSeasonScoresTable(scores, pages.map(p => p.week)));
    lines.push('<h2>Rosters</h2>');
    lines.push(renderRostersSection(rosters));
    lines.push('<h2>Draft</h2>');
    lines.push(renderDraftSection(drafts));
    writeText(path.join(seasonDir, 'index.html'), renderPage({ title: seasonTitle(info), body: lines.join('\n'), root: '../' }));

    pages.forEach((page, i) => {
        writeText(path.join(seasonDir, weekPageName(page.week)), renderWeekPage(info, page, pages[i - 1], pages[i + 1]));
    });
    if (hasPostseasonPage) {
        writeText(path.join(seasonDir, 'postseason.html'), renderPostseasonPage(info, brackets, pages));
    }

    log.info(`Wrote reports for ${season} (${pages.length} week page(s)) to ${seasonDir}`);
    return info;
}

const ALL_TIME_PAGES = [
    { file: 'standings.html', title: 'Standings' },
    { file: 'head_to_head.html', title: 'Head to head' },
    { file: 'weekly_high_scores.html', title: 'Weekly high scores' },
    { file: 'player_high_scores.html', title: 'Player high scores' },
] as const;

function when(m: ScoreMoment): string {
    return `${m.season} wk ${m.week}`;
}

function momentCell(m: ScoreMoment | null): string {
    return m ? `${formatNum(m.points)} <span class="muted">(${when(m)})</span>` : '';
}

function marginCell(m: MarginMoment | null): string {
    return m ? `${formatNum(m.margin)} vs ${escapeHtml(m.opponentName)} <span class="muted">(${when(m)})</span>` : '';
}

export function renderAllTimeStandingsTable(rows: AllTimeStandingRow[]): string {
    if (rows.length === 0) return '<p class="muted">No regular season games yet.</p>';
    return renderTable(
        ['Rank', 'Manager', 'Seasons', 'Record', 'Win %', 'PF', 'PA', 'Avg PF', 'Avg PA', 'Avg margin', 'Std dev',
            'High', 'Low', 'Largest win', 'Largest loss', 'Median win %', 'Lucky W', 'Unlucky L', 'Top weeks', 'Low weeks'],
        rows.map((r, i) => [
            String(i + 1),
            escapeHtml(r.managerName),
            String(r.seasons),
            formatRecord(r.wins, r.losses, r.ties),
            formatPercent(r.winPct),
            formatNum(r.pointsFor),
            formatNum(r.pointsAgainst),
            formatNum(r.averagePointsFor),
            formatNum(r.averagePointsAgainst),
            formatNum(r.averageMargin),
            formatNum(r.pointsStdDev),
            momentCell(r.highScore),
            momentCell(r.lowScore),
            marginCell(r.largestWin),
            marginCell(r.largestLoss),
            formatPercent(r.medianWinPct),
            String(r.luckyWins),
            String(r.unluckyLosses),
            String(r.topScoreWeeks),
            String(r.lowScoreWeeks),
        ]),
        'standings'
    );
}

/** Rows read against columns: the row manager's record versus the column manager. */
export function renderHeadToHeadTable(table: HeadToHeadTable): string {
    if (table.managers.length === 0) return '<p class="muted">No regular season games yet.</p>';
    return renderTable(
        ['', ...table.managers.map(m => m.managerName)],
        table.managers.map(row => [
            escapeHtml(row.managerName),
            ...table.managers.map(col => {
                const record = table.records[row.userId]?.[col.userId];
                return record ? formatRecord(record.wins, record.losses, record.ties) : '<span class="muted">-</span>';
            }),
        ]),
        'head-to-head'
    );
}

export function renderWeeklyHighScoresTable(rows: WeeklyHighScore[]): string {
    if (rows.length === 0) return '<p class="muted">No scores yet.</p>';
    return renderTable(
        ['Rank', 'Points', 'Manager', 'Team', 'Season', 'Week'],
        rows.map((r, i) => [
            String(i + 1),
            formatNum(r.points),
            escapeHtml(r.managerName),
            escapeHtml(r.teamName),
            r.season,
            `${r.week}${r.postseason ? ' (playoffs)' : ''}`,
        ])
    );
}

export function renderPlayerHighScoresTable(rows: PlayerHighScore[]): string {
    if (rows.length === 0) return '<p class="muted">No scores yet.</p>';
    return renderTable(
        ['Rank', 'Points', 'Player', 'Pos', 'Team', 'Season', 'Week', 'Role'],
        rows.map((r, i) => [
            String(i + 1),
            formatNum(r.points),
            playerCell(r.player),
            escapeHtml(r.player.positions[0] ?? ''),
            escapeHtml(r.teamName),
            r.season,
            String(r.week),
            r.starter ? 'Starter' : 'Bench',
        ])
    );
}

/**
 * Renders <reports>/all_time/ from the munged all-time stats. Returns false,
 * writing nothing, when those stats have not been munged.
 */
export function generateAllTimeReports(mungedDir: string, reportsDir: string): boolean {
    const standings = readJson<AllTimeStandingRow[]>(allTimeFilePath(mungedDir, 'standings'));
    if (!standings) {
        log.warn(`No all-time stats in ${mungedDir}; munge the data to build them`);
        return false;
    }
    const headToHead = readJson<HeadToHeadTable>(allTimeFilePath(mungedDir, 'head_to_head')) ?? { managers: [], records: {} };
    const weeklyHighScores = readJson<WeeklyHighScore[]>(allTimeFilePath(mungedDir, 'weekly_high_scores')) ?? [];
    const playerHighScores = readJson<PlayerHighScore[]>(allTimeFilePath(mungedDir, 'player_high_scores')) ?? [];

    const bodies: Record<(typeof ALL_TIME_PAGES)[number]['file'], string> = {
        'standings.html': renderAllTimeStandingsTable(standings),
        'head_to_head.html': renderHeadToHeadTable(headToHead),
        'weekly_high_scores.html': renderWeeklyHighScoresTable(weeklyHighScores),
        'player_high_scores.html': renderPlayerHighScoresTable(playerHighScores),
    };

    const dir = path.join(reportsDir, ALL_TIME_DIR);
    fs.rmSync(dir, { recursive: true, force: true });
    const links = `<p class="week-links">${ALL_TIME_PAGES.map(p => `<a href="${p.file}">${p.title}</a>`).join(' ')}</p>`;
    for (const { file, title } of ALL_TIME_PAGES) {
        const body = [links, `<h1>All-time ${title.toLowerCase()}</h1>`, bodies[file]].join('\n');
        writeText(path.join(dir, file), renderPage({ title: `All-time ${title.toLowerCase()}`, body, root: '../' }));
    }
    log.info(`Wrote all-time reports to ${dir}`);
    return true;
}

/**
 * Renders every munged season, the all-time pages and the top-level index. A
 * season that fails is logged and left out of the index.
 */
export function generateAllReports(mungedDir: string, reportsDir: string): string[] {
    const generated: SeasonInfo[] = [];
    for (const season of listMungedSeasons(mungedDir)) {
        try {
            generated.push(generateSeasonReports(season, mungedDir, reportsDir));
        } catch (err) {
            log.error(`Error generating reports for ${season}: ${errorMessage(err)}. Continuing with next season.`);
        }
    }
    if (generated.length === 0) log.warn(`No munged seasons found in ${mungedDir}`);
    const hasAllTime = generateAllTimeReports(mungedDir, reportsDir);

    const lines: string[] = [];
    lines.push('<h1>League history</h1>');
    if (generated.length === 0) {
        lines.push('<p class="muted">No seasons yet.</p>');
    } else {
        lines.push('<ul>');
        for (const info of generated) {
            lines.push(`<li><a href="${info.season}/index.html">${escapeHtml(seasonTitle(info))}</a></li>`);
        }
        lines.push('</ul>');
    }
    if (hasAllTime) {
        lines.push('<h2>All-time</h2>');
        lines.push('<ul>');
        for (const { file, title } of ALL_TIME_PAGES) {
            lines.push(`<li><a href="${ALL_TIME_DIR}/${file}">${title}</a></li>`);
        }
        lines.push('</ul>');
    }
    const indexFile = path.join(reportsDir, 'index.html');
    writeText(indexFile, renderPage({ title: 'League history', body: lines.join('\n'), root: '' }));
    log.info(`Wrote report index to ${indexFile}`);

    return generated.map(info => info.season);
}
