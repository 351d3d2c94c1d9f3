export type DraftPickRow = {
    round: number;
    pickNo: number;
    playerId: string;
    playerName: string;
    position: string;
}

export type DraftTeam = {
    teamName: string;
    draftSlot: number;
    picks: DraftPickRow[];
}

export type DraftBoard = {
    draftId: string;
    season: string;
    teams: DraftTeam[];
}
