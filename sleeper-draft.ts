export type SleeperDraft = {
	draft_id: string;
	season: string;
	type?: string;
	status?: string;
	draft_order?: Record<string, number> | null; // user id -> draft slot
	settings?: Record<string, unknown>;
	[key: string]: unknown;
};

export type SleeperDraftPick = {
	round: number;
	pick_no: number;
	draft_slot?: number;
	roster_id?: number | null;
	player_id: string;
	picked_by: string; // user id, empty for an autopick on an orphan
	metadata?: {
		first_name?: string;
		last_name?: string;
		position?: string;
		team?: string;
		[key: string]: unknown;
	} | null;
	[key: string]: unknown;
};
