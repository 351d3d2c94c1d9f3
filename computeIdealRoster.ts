import type { PlayerRef, ScoredPlayer } from './player-model';
import type { IdealRoster, LineupSlot } from './ideal-roster';
import type { PlayerIndex } from './lookups';
import { createEmptyPlayer, resolvePlayer } from './lookups';
import { round, sum } from './mathUtils';

// Positions each starting slot accepts. Slots not listed accept only their own position.
const SLOT_ELIGIBILITY: Record<string, string[]> = {
    FLEX: ['RB', 'WR', 'TE'],
    WRRB_FLEX: ['RB', 'WR'],
    REC_FLEX: ['WR', 'TE'],
    SUPER_FLEX: ['QB', 'RB', 'WR', 'TE'],
    IDP_FLEX: ['DL', 'LB', 'DB'],
};

const NON_STARTING_SLOTS = new Set(['BN', 'IR', 'TAXI']);

export type LineupOrder = 'highest' | 'lowest';

export function slotEligibility(slot: string): string[] {
    return SLOT_ELIGIBILITY[slot] ?? [slot];
}

export function isStartingSlot(slot: string): boolean {
    return !NON_STARTING_SLOTS.has(slot);
}

export function isFlexEligible(player: PlayerRef): boolean {
    return player.positions.some(pos => SLOT_ELIGIBILITY.FLEX.includes(pos));
}

function emptyScoredPlayer(): ScoredPlayer {
    return { ...createEmptyPlayer(), points: 0 };
}

function pickFirst(players: ScoredPlayer[], used: Set<string>, predicate: (p: ScoredPlayer) => boolean): ScoredPlayer | null {
    for (const p of players) {
        if (used.has(p.playerId)) continue;
        if (predicate(p)) return p;
    }
    return null;
}

/**
 * Best lineup a team could have started given what every rostered player
 * scored. Dedicated slots are filled first, then flex slots from the narrowest
 * eligibility to the widest. With order 'lowest' every slot takes the fewest
 * points instead.
 */
export function computeIdealRoster(
    playersPoints: Record<string, number>,
    players: PlayerIndex,
    rosterPositions: string[],
    order: LineupOrder = 'highest'
): IdealRoster {
    const direction = order === 'highest' ? -1 : 1;
    const candidates: ScoredPlayer[] = Object.entries(playersPoints)
        .map(([id, points]) => ({ ...resolvePlayer(id, players), points: Number.isFinite(points) ? points : 0 }))
        .sort((a, b) => direction * (a.points - b.points) || a.playerId.localeCompare(b.playerId));

    const slots = rosterPositions
        .map((slot, order) => ({ slot, order }))
        .filter(s => isStartingSlot(s.slot));

    const fillOrder = [...slots].sort(
        (a, b) => slotEligibility(a.slot).length - slotEligibility(b.slot).length || a.order - b.order
    );

    const used = new Set<string>();
    const filled = new Map<number, ScoredPlayer>();
    for (const { slot, order } of fillOrder) {
        const eligible = slotEligibility(slot);
        const best = pickFirst(candidates, used, p => p.positions.some(pos => eligible.includes(pos)));
        if (best) used.add(best.playerId);
        filled.set(order, best ?? emptyScoredPlayer());
    }

    const lineup: LineupSlot[] = slots.map(({ slot, order }) => ({
        slot,
        player: filled.get(order) ?? emptyScoredPlayer(),
    }));

    return {
        slots: lineup,
        totalPoints: round(sum(lineup.map(s => s.player.points))),
    };
}
