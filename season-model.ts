export type SeasonInfo = {
    season: string;
    leagueId: string;
    leagueName: string;
    playoffWeekStart: number;
    lastScoredWeek: number;
    rosterPositions: string[];
    regularSeasonWeeks: number[];
    postseasonWeeks: number[];
}
