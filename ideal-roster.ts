import type { ScoredPlayer } from "./player-model";

export type LineupSlot = {
    slot: string; // roster position as Sleeper names it: QB, RB, FLEX, SUPER_FLEX, DEF, ...
    player: ScoredPlayer;
}

export type IdealRoster = {
    slots: LineupSlot[];
    totalPoints: number;
}
