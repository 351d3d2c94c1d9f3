import type { PlayerRef } from './player-model';
import type { SleeperPlayerIndex } from './sleeper-player';
import type { SleeperUser } from './sleeper-user';
import type { SleeperRoster } from './sleeper-roster';

export const UNKNOWN_OWNER = 'Unknown Owner';
export const EMPTY_SLOT_ID = '0';

export type UserInfo = {
    userId: string;
    displayName: string;
    teamName: string;
};

export type RosterOwner = {
    rosterId: number;
    ownerId: string | null;
    ownerName: string;
    teamName: string;
};

export type PlayerIndex = Map<string, PlayerRef>;
export type UserIndex = Map<string, UserInfo>;
export type RosterIndex = Map<number, RosterOwner>;

export function createEmptyPlayer(): PlayerRef {
    return {
        playerId: EMPTY_SLOT_ID,
        name: 'Empty',
        positions: [],
        team: '',
        resolved: true,
    };
}

function playerName(id: string, raw: NonNullable<SleeperPlayerIndex[string]>): string {
    if (raw.full_name) return raw.full_name;
    const parts = [raw.first_name, raw.last_name].filter((p): p is string => !!p);
    // team defenses only carry first/last name ("Detroit" "Lions")
    return parts.length > 0 ? parts.join(' ') : id;
}

export function buildPlayerIndex(players: SleeperPlayerIndex | undefined): PlayerIndex {
    const index: PlayerIndex = new Map();
    for (const [id, raw] of Object.entries(players ?? {})) {
        if (!raw || typeof raw !== 'object') continue;
        const positions = raw.fantasy_positions && raw.fantasy_positions.length > 0
            ? raw.fantasy_positions
            : raw.position ? [raw.position] : [];
        index.set(id, {
            playerId: id,
            name: playerName(id, raw),
            positions: [...positions],
            team: raw.team ?? '',
            resolved: true,
        });
    }
    return index;
}

/**
 * Looks a player up in the index. Ids the index does not know resolve to a
 * placeholder named after the id itself; "0" marks an empty starting slot.
 */
export function resolvePlayer(playerId: string, players: PlayerIndex): PlayerRef {
    if (playerId === EMPTY_SLOT_ID) return createEmptyPlayer();
    const found = players.get(playerId);
    if (found) return found;
    return { playerId, name: playerId, positions: [], team: '', resolved: false };
}

export function buildUserIndex(users: SleeperUser[] | undefined): UserIndex {
    const index: UserIndex = new Map();
    for (const user of Array.isArray(users) ? users : []) {
        if (!user || !user.user_id) continue;
        const displayName = user.display_name ?? '';
        const teamName = user.metadata?.team_name || `Team ${displayName}`;
        index.set(user.user_id, { userId: user.user_id, displayName, teamName });
    }
    return index;
}

export function fallbackTeamName(rosterId: number): string {
    return `Roster ${rosterId}`;
}

/**
 * Every roster keeps an entry. Owners missing from the user list (or orphaned
 * rosters without an owner) get placeholder names.
 */
export function buildRosterIndex(rosters: SleeperRoster[] | undefined, users: UserIndex): RosterIndex {
    const index: RosterIndex = new Map();
    for (const roster of Array.isArray(rosters) ? rosters : []) {
        if (!roster || typeof roster.roster_id !== 'number') continue;
        const ownerId = roster.owner_id || null;
        const user = ownerId ? users.get(ownerId) : undefined;
        index.set(roster.roster_id, {
            rosterId: roster.roster_id,
            ownerId,
            ownerName: user ? user.displayName : UNKNOWN_OWNER,
            teamName: user ? user.teamName : fallbackTeamName(roster.roster_id),
        });
    }
    return index;
}

export function teamName(rosterId: number | null | undefined, rosters: RosterIndex): string {
    if (rosterId === null || rosterId === undefined) return 'Unknown';
    return rosters.get(rosterId)?.teamName ?? fallbackTeamName(rosterId);
}
