export type StandingRow = {
    rosterId: number;
    teamName: string;
    wins: number;
    losses: number;
    ties: number;
    winPct: number;
    pointsFor: number;
    pointsAgainst: number;
    transactionCount: number;
}

export type SeasonScoreRow = {
    rosterId: number;
    teamName: string;
    weeklyPoints: Record<string, number>; // week number -> points
    weeksPlayed: number;
    totalPoints: number;
    averagePoints: number;
    highestWeek: number;
    lowestWeek: number;
}
