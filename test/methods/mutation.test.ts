import {
  mutation,
  resolveMutation,
  type AnnealedMutationSchedule,
} from '../../src/methods/mutation';

describe('Mutation schedules', () => {
  describe('FIXED', () => {
    it('ignores the best score', () => {
      // Act
      const amount = resolveMutation(mutation.FIXED, 40);
      // Assert
      expect(amount).toEqual({ rate: 0.03, step: 0.08 });
    });
  });

  describe('ANNEALED', () => {
    const cases: Array<[number, { rate: number; step: number }]> = [
      [0, { rate: 0.18, step: 0.45 }],
      [4, { rate: 0.18, step: 0.45 }],
      [5, { rate: 0.12, step: 0.25 }],
      [11, { rate: 0.12, step: 0.25 }],
      [12, { rate: 0.06, step: 0.15 }],
      [250, { rate: 0.06, step: 0.15 }],
    ];
    cases.forEach(([score, expected]) => {
      it(`resolves best score ${score} to rate ${expected.rate}`, () => {
        // Act
        const amount = resolveMutation(mutation.ANNEALED, score);
        // Assert
        expect(amount).toEqual(expected);
      });
    });

    it('never goes below the floors', () => {
      // Arrange
      const schedule: AnnealedMutationSchedule = {
        name: 'ANNEALED',
        stages: [{ rate: 0.01, step: 0.02 }],
        minRate: 0.05,
        minStep: 0.1,
      };
      // Act
      const amount = resolveMutation(schedule, 3);
      // Assert
      expect(amount).toEqual({ rate: 0.05, step: 0.1 });
    });

    it('falls back to the last stage when every threshold is passed', () => {
      // Arrange
      const schedule: AnnealedMutationSchedule = {
        name: 'ANNEALED',
        stages: [
          { belowScore: 2, rate: 0.5, step: 0.5 },
          { belowScore: 4, rate: 0.3, step: 0.3 },
        ],
        minRate: 0,
        minStep: 0,
      };
      // Act
      const amount = resolveMutation(schedule, 9);
      // Assert
      expect(amount).toEqual({ rate: 0.3, step: 0.3 });
    });
  });
});
