/**
 * League metadata from `GET /league/<league_id>`. One object per season; older
 * seasons are reached through previous_league_id.
 */
export type SleeperLeague = {
	league_id: string;
	name: string;
	season: string;
	status?: string;
	sport?: string;
	previous_league_id: string | null;
	draft_id?: string | null;
	total_rosters?: number;
	roster_positions?: string[];
	settings: {
		playoff_week_start?: number;
		last_scored_leg?: number;
		leg?: number;
		[key: string]: unknown;
	};
	[key: string]: unknown;
};
