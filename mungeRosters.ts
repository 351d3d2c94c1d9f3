import type { SleeperRoster } from './sleeper-roster';
import type { RosterRecord, RosterRecordStats } from './roster-model';
import type { PlayerRef } from './player-model';
import type { PlayerIndex, RosterIndex } from './lookups';
import { UNKNOWN_OWNER, fallbackTeamName, resolvePlayer } from './lookups';
import { round } from './mathUtils';

/**
 * Sleeper splits points into a whole part and a hundredths part (fpts: 1402,
 * fpts_decimal: 36 is 1402.36).
 */
export function combinePoints(whole: number | undefined, decimal: number | undefined): number {
    return round((whole ?? 0) + (decimal ?? 0) / 100);
}

function recordFromSettings(settings: SleeperRoster['settings'] | undefined): RosterRecordStats {
    return {
        wins: settings?.wins ?? 0,
        losses: settings?.losses ?? 0,
        ties: settings?.ties ?? 0,
        pointsFor: combinePoints(settings?.fpts, settings?.fpts_decimal),
        pointsAgainst: combinePoints(settings?.fpts_against, settings?.fpts_against_decimal),
        maxPoints: combinePoints(settings?.ppts, settings?.ppts_decimal),
    };
}

export function mungeRoster(roster: SleeperRoster, rosters: RosterIndex, players: PlayerIndex): RosterRecord {
    const owner = rosters.get(roster.roster_id);
    const starters = roster.starters ?? [];
    const reserve = roster.reserve ?? [];
    const taxi = roster.taxi ?? [];
    const placed = new Set([...starters, ...reserve, ...taxi]);
    const bench = (roster.players ?? []).filter(id => !placed.has(id)).sort();

    const resolveAll = (ids: string[]): PlayerRef[] => ids.map(id => resolvePlayer(id, players));

    return {
        rosterId: roster.roster_id,
        ownerId: owner?.ownerId ?? roster.owner_id ?? null,
        ownerName: owner?.ownerName ?? UNKNOWN_OWNER,
        teamName: owner?.teamName ?? fallbackTeamName(roster.roster_id),
        record: recordFromSettings(roster.settings),
        starters: resolveAll(starters),
        bench: resolveAll(bench),
        reserve: resolveAll(reserve),
        taxi: resolveAll(taxi),
    };
}

export function mungeRosters(raw: SleeperRoster[] | undefined, rosters: RosterIndex, players: PlayerIndex): RosterRecord[] {
    return (Array.isArray(raw) ? raw : [])
        .filter(r => r && typeof r.roster_id === 'number')
        .map(r => mungeRoster(r, rosters, players))
        .sort((a, b) => a.rosterId - b.rosterId);
}
