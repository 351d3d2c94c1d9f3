/**
 * Entry of the league-independent player index from `GET /players/nfl`, which
 * is an object keyed by player id. Team defenses are keyed by abbreviation ("DET").
 */
export type SleeperPlayer = {
	player_id: string;
	full_name?: string | null;
	first_name?: string | null;
	last_name?: string | null;
	position?: string | null;
	fantasy_positions?: string[] | null;
	team?: string | null;
	status?: string | null;
	[key: string]: unknown;
};

export type SleeperPlayerIndex = Record<string, SleeperPlayer | null>;
