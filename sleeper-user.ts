/**
 * A league member from `GET /league/<league_id>/users`.
 */
export type SleeperUser = {
	user_id: string;
	display_name: string;
	username?: string;
	avatar?: string | null;
	is_owner?: boolean | null;
	metadata?: {
		team_name?: string;
		[key: string]: unknown;
	} | null;
	[key: string]: unknown;
};
