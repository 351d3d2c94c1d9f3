import { describe, it, expect } from 'vitest';
import { buildPlayerIndex } from './lookups';
import { computeIdealRoster, isFlexEligible, isStartingSlot, slotEligibility } from './computeIdealRoster';

const players = buildPlayerIndex({
    qb1: { player_id: 'qb1', full_name: 'Quarter One', position: 'QB' },
    qb2: { player_id: 'qb2', full_name: 'Quarter Two', position: 'QB' },
    rb1: { player_id: 'rb1', full_name: 'Running One', position: 'RB' },
    rb2: { player_id: 'rb2', full_name: 'Running Two', position: 'RB' },
    wr1: { player_id: 'wr1', full_name: 'Wide One', position: 'WR' },
    te1: { player_id: 'te1', full_name: 'Tight One', position: 'TE' },
});

describe('computeIdealRoster', () => {
    it('fills dedicated slots before flex slots', () => {
        const ideal = computeIdealRoster(
            { qb1: 30, qb2: 25, rb1: 20, rb2: 18, wr1: 15, te1: 22 },
            players,
            ['QB', 'RB', 'WR', 'FLEX', 'SUPER_FLEX', 'BN', 'BN']
        );

        expect(ideal.slots.map(s => [s.slot, s.player.playerId])).toEqual([
            ['QB', 'qb1'],
            ['RB', 'rb1'],
            ['WR', 'wr1'],
            ['FLEX', 'te1'],
            ['SUPER_FLEX', 'qb2'],
        ]);
        expect(ideal.totalPoints).toBe(112);
    });

    it('fills the widest flex last whatever its position in the list', () => {
        const ideal = computeIdealRoster(
            { qb1: 30, rb1: 20, rb2: 10, wr1: 5 },
            players,
            ['SUPER_FLEX', 'FLEX', 'QB', 'RB']
        );

        expect(ideal.slots.map(s => [s.slot, s.player.playerId])).toEqual([
            ['SUPER_FLEX', 'wr1'],
            ['FLEX', 'rb2'],
            ['QB', 'qb1'],
            ['RB', 'rb1'],
        ]);
        expect(ideal.totalPoints).toBe(65);
    });

    it('builds the lowest lineup when asked', () => {
        const lowest = computeIdealRoster(
            { qb1: 30, qb2: 25, rb1: 20, rb2: 18, wr1: 15, te1: 22 },
            players,
            ['QB', 'RB', 'FLEX'],
            'lowest'
        );

        expect(lowest.slots.map(s => [s.slot, s.player.playerId])).toEqual([
            ['QB', 'qb2'],
            ['RB', 'rb2'],
            ['FLEX', 'wr1'],
        ]);
        expect(lowest.totalPoints).toBe(58);
    });

    it('leaves a slot empty when nobody is eligible', () => {
        const ideal = computeIdealRoster({ qb1: 12.5, unknown: 40 }, players, ['QB', 'K']);

        expect(ideal.slots[1]).toEqual({
            slot: 'K',
            player: { playerId: '0', name: 'Empty', positions: [], team: '', resolved: true, points: 0 },
        });
        expect(ideal.totalPoints).toBe(12.5);
    });

    it('knows which slots start and what they accept', () => {
        expect(slotEligibility('REC_FLEX')).toEqual(['WR', 'TE']);
        expect(slotEligibility('DEF')).toEqual(['DEF']);
        expect(isStartingSlot('BN')).toBe(false);
        expect(isStartingSlot('IR')).toBe(false);
        expect(isStartingSlot('WRRB_FLEX')).toBe(true);
        expect(isFlexEligible({ playerId: 'te1', name: 'Tight One', positions: ['TE'], team: '', resolved: true })).toBe(true);
        expect(isFlexEligible({ playerId: 'qb1', name: 'Quarter One', positions: ['QB'], team: '', resolved: true })).toBe(false);
    });
});
