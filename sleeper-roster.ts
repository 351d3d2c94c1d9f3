/**
 * Represents a single roster object returned by `GET /league/<league_id>/rosters`.
 */
export type SleeperRoster = {
	starters: string[] | null; // player IDs or team placeholder (e.g. "DET") in starting slots, "0" for an empty slot
	settings: {
		wins: number;
		waiver_position?: number;
		waiver_budget_used?: number;
		total_moves?: number;
		ties: number;
		losses: number;
		fpts_decimal?: number;
		fpts_against_decimal?: number;
		fpts_against?: number;
		fpts: number;
		ppts?: number;
		ppts_decimal?: number;
		// allow other numeric or string settings that might appear
		[key: string]: number | string | undefined;
	};
	roster_id: number;
	reserve: string[] | null; // list of player ids on IR
	taxi?: string[] | null;
	players: string[] | null; // all player ids on the roster (starters + bench + reserve + taxi)
	owner_id: string | null; // null for an orphaned team
	league_id: string;

	co_owners?: string[] | null;
	[key: string]: unknown;
};
