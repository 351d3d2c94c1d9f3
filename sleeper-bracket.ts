/**
 * A playoff bracket matchup from `GET /league/<league_id>/winners_bracket` or
 * `losers_bracket`. Teams not yet known are null and described by t1_from/t2_from.
 */
export type SleeperBracketMatchup = {
	r: number; // round
	m: number; // matchup id
	t1: number | null;
	t2: number | null;
	w: number | null;
	l: number | null;
	p?: number | null; // place decided by this matchup
	t1_from?: { w?: number; l?: number } | null;
	t2_from?: { w?: number; l?: number } | null;
	[key: string]: unknown;
};
