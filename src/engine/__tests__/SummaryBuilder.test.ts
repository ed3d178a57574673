import { LineKind } from '../../models/CoverageModels';
import { SourceFile } from '../SourceFile';
import { buildFileSummary, buildSummary, lineState, meetsThreshold, percent } from '../SummaryBuilder';

const OPTIONS = { trackBlocks: true, trackConditions: false };
const NO_COUNTERS = { outOfRangeLines: 0, unregisteredFileEvents: 0, internalFaults: 0 };

describe('SummaryBuilder', () => {
  describe('percent', () => {
    it('should round to two decimals', () => {
      expect(percent(1, 3)).toBe(33.33);
      expect(percent(2, 3)).toBe(66.67);
    });

    it('should treat nothing to cover as fully covered', () => {
      expect(percent(0, 0)).toBe(100);
    });
  });

  describe('lineState', () => {
    it('should derive the display state of a line', () => {
      expect(lineState(LineKind.NonExecutable, 3, true)).toBe('not-executable');
      expect(lineState(LineKind.BlockEnd, 1, false)).toBe('not-executable');
      expect(lineState(LineKind.Executable, 0, false)).toBe('not-executed');
      expect(lineState(LineKind.BlockStart, 2, false)).toBe('executed');
      expect(lineState(LineKind.Executable, 1, true)).toBe('covered');
    });
  });

  describe('buildFileSummary', () => {
    it('should give nested blocks their depth and start-line counts', () => {
      const file = new SourceFile('src/loop.lua', [
        'for i = 1, 2 do',
        '  if i > 1 then',
        '    print(i)',
        '  end',
        'end',
      ].join('\n'));
      file.table.increment(1);
      file.table.increment(2);
      file.table.increment(2);

      const summary = buildFileSummary(file, OPTIONS);

      expect(summary.blocks.map((block) => [block.key, block.depth, block.executionCount])).toEqual([
        ['1-5:loop', 0, 1],
        ['2-4:branch', 1, 2],
      ]);
      expect(summary.executableLines).toBe(3);
      expect(summary.executedLines).toBe(2);
      expect(summary.executionPercent).toBe(66.67);
    });

    it('should keep condition records detached from later updates', () => {
      const file = new SourceFile('src/cond.lua', 'if a and b then x() end');
      file.recordCondition(1, 0, true);

      const summary = buildFileSummary(file, { trackBlocks: false, trackConditions: true });
      file.recordCondition(1, 0, true);

      expect(summary.conditions).toEqual([{ line: 1, index: 0, trueCount: 1, falseCount: 0 }]);
    });
  });

  describe('buildSummary', () => {
    it('should total files and merge session counters into the anomalies', () => {
      const first = new SourceFile('src/b.lua', 'x = 1\ny = 2');
      const second = new SourceFile('src/a.lua', 'z = 3');
      first.table.increment(1);
      second.table.markCovered(1);

      const summary = buildSummary('session-1', [first, second], OPTIONS, {
        outOfRangeLines: 2,
        unregisteredFileEvents: 1,
        internalFaults: 0,
      });

      expect(summary.sessionId).toBe('session-1');
      expect(summary.files.map((file) => file.path)).toEqual(['src/a.lua', 'src/b.lua']);
      expect(summary.totalLines).toBe(3);
      expect(summary.executableLines).toBe(3);
      expect(summary.executedLines).toBe(2);
      expect(summary.coveredLines).toBe(1);
      expect(summary.coveragePercent).toBe(33.33);
      expect(summary.functions).toEqual({ total: 0, covered: 0, pct: 100 });
      expect(summary.blocks).toEqual({ total: 0, covered: 0, pct: 100 });
      expect(summary.conditions).toBeNull();
      expect(summary.anomalies.outOfRangeLines).toBe(2);
      expect(summary.anomalies.unregisteredFileEvents).toBe(1);
    });
  });

  describe('meetsThreshold', () => {
    it('should compare the covered percentage with the threshold', () => {
      const summary = buildSummary('s', [new SourceFile('a.lua', 'x = 1\ny = 2')], OPTIONS, NO_COUNTERS);
      expect(meetsThreshold(summary, 0)).toBe(true);
      expect(meetsThreshold(summary, 1)).toBe(false);
    });
  });
});
