import type { ScoredPlayer } from "./player-model";
import type { StandingRow } from "./standings-model";
import type { IdealRoster } from "./ideal-roster";

export type MatchupSide = {
    rosterId: number;
    teamName: string;
    points: number;
    starters: ScoredPlayer[];
    bench: ScoredPlayer[];
}

export type MatchupRecord = {
    week: number;
    matchupId: number | null;
    home: MatchupSide;
    away: MatchupSide | null; // null on a bye
    winnerRosterId: number | null; // null on a tie or a bye
    margin: number;
}

export type TeamScore = {
    rosterId: number;
    teamName: string;
    points: number;
}

export type ResultAward = TeamScore & {
    opponentPoints: number;
    margin: number;
}

export type EfficiencyAward = {
    rosterId: number;
    teamName: string;
    actualPoints: number;
    optimalPoints: number;
    pointsLeftOnBench: number;
}

export type WeeklyAwards = {
    highestPointsInLoss: ResultAward | null;
    lowestPointsInWin: ResultAward | null;
    largestWinningMargin: ResultAward | null;
    smallestWinningMargin: ResultAward | null;
    mostEfficientManager: EfficiencyAward | null;
    leastEfficientManager: EfficiencyAward | null;
}

// Lineups drawn from every roster in the league that week.
export type LeagueLineups = {
    highestScoringStarters: IdealRoster; // best possible lineup from any rostered player
    lowestScoringStarters: IdealRoster; // worst lineup from players who actually started
    benchwarmers: IdealRoster; // bench players who outscored a starter they could have replaced
}

export type WeeklyRecap = {
    season: string;
    week: number;
    postseason: boolean;
    matchups: MatchupRecord[];
    highestScoringTeam: TeamScore | null;
    lowestScoringTeam: TeamScore | null;
    awards: WeeklyAwards;
    lineups: LeagueLineups;
    standings: StandingRow[]; // standings through this week, empty in the postseason
}
