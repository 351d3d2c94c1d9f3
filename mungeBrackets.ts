import type { SleeperBracketMatchup } from './sleeper-bracket';
import type { BracketRow } from './bracket-model';
import type { RosterIndex } from './lookups';
import { teamName } from './lookups';

function slotLabel(
    rosterId: number | null,
    from: SleeperBracketMatchup['t1_from'],
    rosters: RosterIndex
): string {
    if (typeof rosterId === 'number') return teamName(rosterId, rosters);
    if (from?.w !== undefined) return `Winner of ${from.w}`;
    if (from?.l !== undefined) return `Loser of ${from.l}`;
    return 'TBD';
}

function nameOrNull(rosterId: number | null, rosters: RosterIndex): string | null {
    return typeof rosterId === 'number' ? teamName(rosterId, rosters) : null;
}

export function mungeBracket(bracket: SleeperBracketMatchup[] | null | undefined, rosters: RosterIndex): BracketRow[] {
    return (Array.isArray(bracket) ? bracket : [])
        .filter(m => m && typeof m.m === 'number')
        .map(m => ({
            round: m.r ?? 0,
            matchId: m.m,
            team1: slotLabel(m.t1 ?? null, m.t1_from, rosters),
            team2: slotLabel(m.t2 ?? null, m.t2_from, rosters),
            winner: nameOrNull(m.w ?? null, rosters),
            loser: nameOrNull(m.l ?? null, rosters),
            place: typeof m.p === 'number' ? m.p : null,
        }))
        .sort((a, b) => a.round - b.round || a.matchId - b.matchId);
}
