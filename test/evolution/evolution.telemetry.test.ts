import { EvolutionEngine } from '../../src/evolution';
import {
  formatSummaryLine,
  SUMMARY_COLUMNS,
} from '../../src/evolution/evolution.telemetry';
import type { GenerationSummary } from '../../src/evolution/evolution.types';
import { playEpisode, recordingLogger } from '../utils/test-helpers';

const summary: GenerationSummary = {
  generation: 1,
  bestScore: 2,
  bestFitness: 2010,
  meanFitness: 1000.5,
  championScore: null,
  championFitness: null,
  mutationRate: 0.03,
  mutationStep: 0.08,
  eliteCount: 2,
  hallOfFameSize: 0,
  durationMs: 1.5,
};

describe('Telemetry', () => {
  describe('formatSummaryLine()', () => {
    it('formats a generation with a champion', () => {
      // Arrange
      const line = {
        ...summary,
        generation: 3,
        bestScore: 4,
        championScore: 6,
        mutationRate: 0.18,
        mutationStep: 0.45,
      };
      // Act
      const text = formatSummaryLine(line);
      // Assert
      expect(text).toBe(
        '=== Generation 3 === bestScore(gen)=4 | championScore=6 | rate=0.180 step=0.450'
      );
    });
    it('prints a dash without a champion', () => {
      // Act
      const text = formatSummaryLine(summary);
      // Assert
      expect(text).toBe(
        '=== Generation 1 === bestScore(gen)=2 | championScore=- | rate=0.030 step=0.080'
      );
    });
  });

  describe('buffer', () => {
    it('keeps only the most recent entries', () => {
      // Arrange
      const engine = new EvolutionEngine({ popSize: 3, seed: 2, telemetry: { maxEntries: 2 } });
      // Act
      for (let i = 0; i < 3; i++) {
        playEpisode(engine, [i, 0, 0], []);
        engine.evolve();
      }
      // Assert
      expect(engine.getTelemetry().map((entry) => entry.generation)).toEqual([2, 3]);
    });
    it('buffers nothing when disabled but still logs', () => {
      // Arrange
      const logger = recordingLogger();
      const engine = new EvolutionEngine({
        popSize: 3,
        seed: 2,
        logger,
        telemetry: { enabled: false },
      });
      // Act
      engine.evolve();
      // Assert
      expect([engine.getTelemetry().length, logger.infos.length]).toEqual([0, 1]);
    });
    it('returns the value recorded by evolve', () => {
      // Arrange
      const engine = new EvolutionEngine({ popSize: 3, seed: 2 });
      // Act
      const recorded = engine.evolve();
      // Assert
      expect(engine.getTelemetry()).toEqual([recorded]);
    });
    it('can be cleared', () => {
      // Arrange
      const engine = new EvolutionEngine({ popSize: 3, seed: 2 });
      engine.evolve();
      // Act
      engine.clearTelemetry();
      // Assert
      expect(engine.getTelemetry()).toEqual([]);
    });
  });

  describe('exports', () => {
    let engine: EvolutionEngine;

    beforeEach(() => {
      engine = new EvolutionEngine({ popSize: 2, seed: 2 });
      engine._telemetry = [summary, { ...summary, generation: 2, championScore: 2, championFitness: 2010 }];
    });

    it('writes a CSV header and one row per entry', () => {
      // Act
      const csv = engine.exportTelemetryCSV();
      // Assert
      expect(csv.split('\n')).toEqual([
        SUMMARY_COLUMNS.join(','),
        '1,2,2010,1000.5,,,0.03,0.08,2,0,1.5',
        '2,2,2010,1000.5,2,2010,0.03,0.08,2,0,1.5',
      ]);
    });
    it('limits the CSV to the most recent entries', () => {
      // Act
      const csv = engine.exportTelemetryCSV(1);
      // Assert
      expect(csv.split('\n').length).toBe(2);
    });
    it('returns an empty CSV when nothing is buffered', () => {
      // Arrange
      engine.clearTelemetry();
      // Act
      const csv = engine.exportTelemetryCSV();
      // Assert
      expect(csv).toBe('');
    });
    it('writes one JSON object per line', () => {
      // Act
      const lines = engine.exportTelemetryJSONL().split('\n');
      // Assert
      expect(lines.map((line) => JSON.parse(line))).toEqual(engine.getTelemetry());
    });
  });
});
