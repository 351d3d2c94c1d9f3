export type SleeperTradedPick = {
	season: string;
	round: number;
	roster_id: number; // original owner of the pick
	previous_owner_id: number;
	owner_id: number; // new owner
};

export type SleeperWaiverBudgetTransfer = {
	sender: number;
	receiver: number;
	amount: number;
};

/**
 * An entry from `GET /league/<league_id>/transactions/<week>`. The fields present
 * depend on the type: trades carry draft_picks and waiver_budget, waivers carry
 * settings.waiver_bid, commissioner actions may carry nothing but adds or drops.
 */
export type SleeperTransaction = {
	transaction_id: string;
	type: string; // "trade" | "waiver" | "free_agent" | "commissioner" and anything else Sleeper adds
	status: string;
	status_updated?: number;
	roster_ids?: number[] | null;
	consenter_ids?: number[] | null;
	creator?: string | null;
	created?: number | null;
	leg?: number;
	adds?: Record<string, number> | null; // player id -> roster id receiving
	drops?: Record<string, number> | null; // player id -> roster id releasing
	draft_picks?: SleeperTradedPick[] | null;
	waiver_budget?: SleeperWaiverBudgetTransfer[] | null;
	settings?: {
		waiver_bid?: number;
		seq?: number;
		[key: string]: unknown;
	} | null;
	metadata?: {
		notes?: string;
		[key: string]: unknown;
	} | null;
	[key: string]: unknown;
};
