export type PlayerRef = {
    playerId: string;
    name: string;
    positions: string[];
    team: string;
    resolved: boolean; // false when the id is missing from the player index
}

export type ScoredPlayer = PlayerRef & {
    points: number;
}
