import type { PlayerRef } from './player-model';

export type ScoreMoment = {
    points: number;
    season: string;
    week: number;
}

export type MarginMoment = ScoreMoment & {
    margin: number;
    opponentName: string;
}

// One row per manager (Sleeper user_id), regular season games only
export type AllTimeStandingRow = {
    userId: string;
    managerName: string;
    seasons: number;
    games: number;
    wins: number;
    losses: number;
    ties: number;
    winPct: number;
    pointsFor: number;
    pointsAgainst: number;
    averagePointsFor: number;
    averagePointsAgainst: number;
    averageMargin: number;
    pointsStdDev: number;
    highScore: ScoreMoment | null;
    lowScore: ScoreMoment | null;
    largestWin: MarginMoment | null;
    largestLoss: MarginMoment | null;
    medianWinPct: number; // share of weeks scoring above that week's league median
    luckyWins: number; // wins while scoring below the weekly median
    unluckyLosses: number; // losses while scoring above it
    topScoreWeeks: number;
    lowScoreWeeks: number;
}

export type HeadToHeadRecord = {
    wins: number;
    losses: number;
    ties: number;
}

export type HeadToHeadTable = {
    managers: { userId: string; managerName: string }[];
    records: Record<string, Record<string, HeadToHeadRecord>>; // userId -> opponent userId -> record
}

export type WeeklyHighScore = ScoreMoment & {
    managerName: string;
    teamName: string;
    postseason: boolean;
}

export type PlayerHighScore = ScoreMoment & {
    player: PlayerRef;
    teamName: string;
    starter: boolean;
}

export type AllTimeStats = {
    seasons: string[];
    standings: AllTimeStandingRow[];
    headToHead: HeadToHeadTable;
    weeklyHighScores: WeeklyHighScore[];
    playerHighScores: PlayerHighScore[];
}
