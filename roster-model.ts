import type { PlayerRef } from "./player-model";

export type RosterRecordStats = {
    wins: number;
    losses: number;
    ties: number;
    pointsFor: number;
    pointsAgainst: number;
    maxPoints: number;
}

export type RosterRecord = {
    rosterId: number;
    ownerId: string | null;
    ownerName: string;
    teamName: string;
    record: RosterRecordStats;
    starters: PlayerRef[];
    bench: PlayerRef[];
    reserve: PlayerRef[];
    taxi: PlayerRef[];
}
