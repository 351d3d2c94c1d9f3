import type { PlayerRef } from "./player-model";

export type MovedPlayer = PlayerRef & {
    rosterId: number | null;
    teamName: string;
}

export type TradedPickRow = {
    season: string;
    round: number;
    originalTeam: string;
    fromTeam: string;
    toTeam: string;
}

export type BudgetTransferRow = {
    fromTeam: string;
    toTeam: string;
    amount: number;
}

/**
 * Uniform row every transaction type flattens into. Fields a type does not
 * carry stay empty rather than missing.
 */
export type TransactionRow = {
    transactionId: string;
    week: number | null;
    type: string;
    status: string;
    createdAt: string; // ISO timestamp, '' when unknown
    creatorTeam: string;
    teams: string[];
    adds: MovedPlayer[];
    drops: MovedPlayer[];
    waiverBid: number | null;
    draftPicks: TradedPickRow[];
    budgetTransfers: BudgetTransferRow[];
    notes: string;
    summary: string;
}
