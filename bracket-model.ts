export type BracketRow = {
    round: number;
    matchId: number;
    team1: string; // team name, or "Winner of 3" / "Loser of 2" / "TBD"
    team2: string;
    winner: string | null;
    loser: string | null;
    place: number | null;
}

export type PostseasonBrackets = {
    winners: BracketRow[];
    losers: BracketRow[];
}
