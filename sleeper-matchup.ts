/**
 * One roster's entry in `GET /league/<league_id>/matchups/<week>`. Two entries
 * sharing a matchup_id played each other; matchup_id is null on a bye.
 */
export type SleeperMatchup = {
	roster_id: number;
	matchup_id: number | null;
	points: number | null;
	custom_points?: number | null;
	starters: string[] | null;
	starters_points?: number[] | null;
	players: string[] | null;
	players_points?: Record<string, number> | null;
	[key: string]: unknown;
};
