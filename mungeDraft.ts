import type { SleeperDraft, SleeperDraftPick } from './sleeper-draft';
import type { DraftBoard, DraftTeam } from './draft-model';
import type { PlayerIndex, UserIndex } from './lookups';
import { resolvePlayer } from './lookups';

function draftTeamName(userId: string, users: UserIndex): string {
    return users.get(userId)?.teamName ?? `Team ${userId}`;
}

/**
 * Groups a draft's picks by the team that made them, teams in draft-slot
 * order and picks in round order. Picks without a picker are left out.
 */
export function mungeDraft(
    draft: SleeperDraft,
    picks: SleeperDraftPick[] | undefined,
    users: UserIndex,
    players: PlayerIndex
): DraftBoard {
    const order = draft.draft_order ?? {};
    const teams = new Map<string, DraftTeam>();

    for (const pick of Array.isArray(picks) ? picks : []) {
        if (!pick || !pick.picked_by) continue;
        let team = teams.get(pick.picked_by);
        if (!team) {
            team = {
                teamName: draftTeamName(pick.picked_by, users),
                draftSlot: order[pick.picked_by] ?? pick.draft_slot ?? 0,
                picks: [],
            };
            teams.set(pick.picked_by, team);
        }
        const player = pick.player_id ? resolvePlayer(pick.player_id, players) : undefined;
        const metaName = [pick.metadata?.first_name, pick.metadata?.last_name].filter(Boolean).join(' ');
        team.picks.push({
            round: pick.round ?? 0,
            pickNo: pick.pick_no ?? 0,
            playerId: pick.player_id ?? '',
            playerName: player?.resolved ? player.name : metaName || player?.name || 'Unknown',
            position: pick.metadata?.position || player?.positions[0] || '',
        });
    }

    for (const team of teams.values()) {
        team.picks.sort((a, b) => a.round - b.round || a.pickNo - b.pickNo);
    }

    return {
        draftId: draft.draft_id,
        season: draft.season ?? '',
        teams: [...teams.values()].sort((a, b) => a.draftSlot - b.draftSlot || a.teamName.localeCompare(b.teamName)),
    };
}
