import type { SleeperClient } from './sleeperApi';
import { fetchLeagueHistory, importPlayers } from './fetchLeagueData';
import { listRawSeasons } from './rawStore';
import { mungeAllSeasons, mungeSeason } from './mungeSeason';
import { mungeAllTime } from './mungeAllTime';
import { generateAllReports } from './generateReport';
import { publishReports } from './publishReports';
import { ConfigError, errorMessage } from './errors';
import { getLogger } from './logger';

const log = getLogger('menu');

export type Prompt = (question: string) => Promise<string>;

export type MenuContext = {
    ask: Prompt;
    print: (line: string) => void;
    client: SleeperClient;
    rawDir: string;
    mungedDir: string;
    reportsDir: string;
    publishDir: string;
    leagueId?: string;
};

export type ActionResult = 'continue' | 'exit';

export type MenuOption = {
    label: string;
    run: (ctx: MenuContext) => Promise<ActionResult>;
};

async function confirm(ctx: MenuContext, question: string): Promise<boolean> {
    const answer = (await ctx.ask(`${question} (y/n): `)).trim().toLowerCase();
    return answer === 'y' || answer === 'yes';
}

async function resolveLeagueId(ctx: MenuContext): Promise<string> {
    if (ctx.leagueId) return ctx.leagueId;
    const answer = (await ctx.ask('Enter your Sleeper league id: ')).trim();
    if (!answer) throw new ConfigError('A league id is required; set SLEEPER_LEAGUE_ID or enter one');
    ctx.leagueId = answer;
    return answer;
}

async function fetchData(ctx: MenuContext): Promise<ActionResult> {
    const leagueId = await resolveLeagueId(ctx);
    if (!(await confirm(ctx, `Fetch every season of league ${leagueId} from the Sleeper API?`))) {
        ctx.print('Fetch cancelled.');
        return 'continue';
    }
    const summary = await fetchLeagueHistory(ctx.client, ctx.rawDir, leagueId);
    ctx.print(`Fetched ${summary.seasons.length} season(s): ${summary.seasons.join(', ') || 'none'}`);
    for (const failure of summary.failures) {
        ctx.print(`  failed: ${failure.endpoint}${failure.season ? ` (${failure.season})` : ''}: ${failure.message}`);
    }
    return 'continue';
}

async function importPlayerIndex(ctx: MenuContext): Promise<ActionResult> {
    if (!(await confirm(ctx, 'Download the full NFL player index? Sleeper asks for this at most once a day.'))) {
        ctx.print('Player import cancelled.');
        return 'continue';
    }
    const count = await importPlayers(ctx.client, ctx.rawDir);
    ctx.print(count === undefined ? 'Player import failed.' : `Imported ${count} players.`);
    return 'continue';
}

/**
 * Accepts the list number, the season year, or "a"/"all" (also the default),
 * which comes back as 'all'.
 */
export function pickSeasons(answer: string, seasons: string[]): 'all' | string[] | undefined {
    const choice = answer.trim().toLowerCase();
    if (choice === '' || choice === 'a' || choice === 'all') return 'all';
    if (seasons.includes(choice)) return [choice];
    const index = Number(choice);
    if (Number.isInteger(index) && index >= 1 && index <= seasons.length) return [seasons[index - 1]];
    return undefined;
}

async function mungeData(ctx: MenuContext): Promise<ActionResult> {
    const seasons = listRawSeasons(ctx.rawDir);
    if (seasons.length === 0) {
        ctx.print(`No raw seasons in ${ctx.rawDir}. Fetch league data first.`);
        return 'continue';
    }
    ctx.print('Seasons available:');
    seasons.forEach((season, i) => ctx.print(`  ${i + 1}. ${season}`));
    ctx.print('  a. All seasons');

    const picked = pickSeasons(await ctx.ask('Season to munge (number, year or a): '), seasons);
    if (!picked) {
        ctx.print('Invalid selection.');
        return 'continue';
    }
    if (picked === 'all') {
        const done = mungeAllSeasons(ctx.rawDir, ctx.mungedDir);
        ctx.print(`Munged ${done.length} of ${seasons.length} season(s).`);
    } else {
        for (const season of picked) mungeSeason(season, ctx.rawDir, ctx.mungedDir);
        ctx.print(`Munged ${picked.join(', ')}.`);
    }
    const allTime = mungeAllTime(ctx.rawDir, ctx.mungedDir);
    ctx.print(`Updated all-time stats across ${allTime.seasons.length} season(s).`);
    return 'continue';
}

async function generateReports(ctx: MenuContext): Promise<ActionResult> {
    const seasons = generateAllReports(ctx.mungedDir, ctx.reportsDir);
    ctx.print(`Generated reports for ${seasons.length} season(s) in ${ctx.reportsDir}`);
    return 'continue';
}

async function publish(ctx: MenuContext): Promise<ActionResult> {
    publishReports(ctx.reportsDir, ctx.publishDir, [ctx.rawDir, ctx.mungedDir]);
    ctx.print(`Reports copied to ${ctx.publishDir}`);
    return 'continue';
}

export const MENU_OPTIONS = new Map<string, MenuOption>([
    ['1', { label: 'Fetch league data from the Sleeper API', run: fetchData }],
    ['2', { label: 'Import/update player index', run: importPlayerIndex }],
    ['3', { label: 'Munge raw data', run: mungeData }],
    ['4', { label: 'Generate HTML reports', run: generateReports }],
    ['5', { label: 'Copy reports to the publish folder', run: publish }],
    ['6', { label: 'Exit', run: async () => 'exit' }],
]);

export function renderMenu(): string {
    const lines: string[] = [];
    lines.push('');
    lines.push('Sleeper league reports');
    for (const [key, option] of MENU_OPTIONS) lines.push(`${key}. ${option.label}`);
    return lines.join('\n');
}

/**
 * Runs the menu until Exit is chosen. A failing action is logged and the menu
 * is shown again.
 */
export async function runMenu(ctx: MenuContext): Promise<void> {
    for (;;) {
        ctx.print(renderMenu());
        const choice = (await ctx.ask('Enter your choice: ')).trim();
        const option = MENU_OPTIONS.get(choice);
        if (!option) {
            ctx.print('Invalid choice. Please try again.');
            continue;
        }
        try {
            if ((await option.run(ctx)) === 'exit') return;
        } catch (err) {
            log.error(`${option.label} failed: ${errorMessage(err)}`);
        }
    }
}
