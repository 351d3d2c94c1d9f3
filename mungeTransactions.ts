import type { SleeperTransaction } from './sleeper-transaction';
import type { BudgetTransferRow, MovedPlayer, TradedPickRow, TransactionRow } from './transaction-model';
import type { PlayerIndex, RosterIndex } from './lookups';
import { resolvePlayer, teamName } from './lookups';

export type TransactionDetails = Omit<TransactionRow, 'summary'>;
export type TransactionDescriber = (row: TransactionDetails) => string;

function names(players: MovedPlayer[]): string {
    return players.map(p => p.name).join(', ');
}

function movedPlayers(moves: Record<string, number> | null | undefined, players: PlayerIndex, rosters: RosterIndex): MovedPlayer[] {
    return Object.entries(moves ?? {}).map(([playerId, rosterId]) => ({
        ...resolvePlayer(playerId, players),
        rosterId: typeof rosterId === 'number' ? rosterId : null,
        teamName: typeof rosterId === 'number' ? teamName(rosterId, rosters) : '',
    }));
}

function pickLabel(pick: TradedPickRow): string {
    return `${pick.season} Round ${pick.round} (${pick.originalTeam})`;
}

function describeTrade(row: TransactionDetails): string {
    const parts = row.teams.map(team => {
        const gets = [
            ...row.adds.filter(p => p.teamName === team).map(p => p.name),
            ...row.draftPicks.filter(p => p.toTeam === team).map(pickLabel),
            ...row.budgetTransfers.filter(t => t.toTeam === team).map(t => `$${t.amount} FAAB`),
        ];
        return `${team} receives ${gets.length > 0 ? gets.join(', ') : 'nothing'}`;
    });
    return parts.join('; ');
}

function describeWaiver(row: TransactionDetails): string {
    const bid = row.waiverBid !== null ? ` for $${row.waiverBid}` : '';
    if (row.status === 'failed') return `${row.creatorTeam} failed to claim ${names(row.adds)}${bid}`;
    const drops = row.drops.length > 0 ? `, drops ${names(row.drops)}` : '';
    return `${row.creatorTeam} claims ${names(row.adds)}${bid}${drops}`;
}

function describeFreeAgent(row: TransactionDetails): string {
    const parts: string[] = [];
    if (row.adds.length > 0) parts.push(`adds ${names(row.adds)}`);
    if (row.drops.length > 0) parts.push(`drops ${names(row.drops)}`);
    return `${row.creatorTeam} ${parts.join(', ')}`.trim();
}

/**
 * Used for any type without its own describer: commissioner actions, IR moves
 * and whatever else Sleeper reports.
 */
export function describeGeneric(row: TransactionDetails): string {
    const label = row.type.replace(/_/g, ' ') || 'transaction';
    const by = row.creatorTeam ? ` (${row.creatorTeam})` : '';
    const parts: string[] = [];
    if (row.adds.length > 0) parts.push(`adds ${row.adds.map(p => `${p.name} to ${p.teamName}`).join(', ')}`);
    if (row.drops.length > 0) parts.push(`drops ${row.drops.map(p => `${p.name} from ${p.teamName}`).join(', ')}`);
    return `${label}${by}: ${parts.length > 0 ? parts.join('; ') : 'no roster changes'}`;
}

export const TRANSACTION_DESCRIBERS = new Map<string, TransactionDescriber>([
    ['trade', describeTrade],
    ['waiver', describeWaiver],
    ['free_agent', describeFreeAgent],
]);

export function describeTransaction(row: TransactionDetails): string {
    const describer = TRANSACTION_DESCRIBERS.get(row.type) ?? describeGeneric;
    return describer(row);
}

/**
 * Flattens one transaction into the uniform row shape. Whatever the type does
 * not carry defaults to an empty value.
 */
export function flattenTransaction(
    tx: SleeperTransaction,
    week: number | null,
    players: PlayerIndex,
    rosters: RosterIndex
): TransactionRow {
    const rosterIds = (tx.roster_ids ?? []).filter((id): id is number => typeof id === 'number');
    const waiverBid = tx.settings?.waiver_bid;

    const details: TransactionDetails = {
        transactionId: tx.transaction_id ?? '',
        week: typeof tx.leg === 'number' ? tx.leg : week,
        type: tx.type ?? '',
        status: tx.status ?? '',
        createdAt: typeof tx.created === 'number' ? new Date(tx.created).toISOString() : '',
        creatorTeam: rosterIds.length > 0 ? teamName(rosterIds[0], rosters) : '',
        teams: rosterIds.map(id => teamName(id, rosters)),
        adds: movedPlayers(tx.adds, players, rosters),
        drops: movedPlayers(tx.drops, players, rosters),
        waiverBid: typeof waiverBid === 'number' ? waiverBid : null,
        draftPicks: (tx.draft_picks ?? []).map(pick => ({
            season: String(pick.season ?? ''),
            round: pick.round ?? 0,
            originalTeam: teamName(pick.roster_id, rosters),
            fromTeam: teamName(pick.previous_owner_id, rosters),
            toTeam: teamName(pick.owner_id, rosters),
        })),
        budgetTransfers: (tx.waiver_budget ?? []).map((t): BudgetTransferRow => ({
            fromTeam: teamName(t.sender, rosters),
            toTeam: teamName(t.receiver, rosters),
            amount: t.amount ?? 0,
        })),
        notes: typeof tx.metadata?.notes === 'string' ? tx.metadata.notes : '',
    };

    return { ...details, summary: describeTransaction(details) };
}

export function mungeTransactions(
    raw: SleeperTransaction[] | undefined,
    week: number | null,
    players: PlayerIndex,
    rosters: RosterIndex
): TransactionRow[] {
    return (Array.isArray(raw) ? raw : [])
        .filter(tx => tx && typeof tx === 'object')
        .map(tx => flattenTransaction(tx, week, players, rosters))
        .sort((a, b) => a.createdAt.localeCompare(b.createdAt) || a.transactionId.localeCompare(b.transactionId));
}
