import { CoverageSummary, FileSummary, FunctionSummary } from '../models/CoverageModels';
import { ReportFormatter } from './ReportFormatter';

/**
 * LCOV tracefile. LCOV has no notion of assertion coverage, so line hits are
 * execution counts.
 *
 * Record structure:
 *   SF:<source file>
 *   FN:<line>,<name> / FNDA:<count>,<name> / FNF / FNH
 *   BRDA:<line>,<block>,<branch>,<taken> / BRF / BRH
 *   DA:<line>,<count> / LF / LH
 *   end_of_record
 */
export class LcovFormatter implements ReportFormatter {
    readonly name = 'lcov';
    readonly extension = 'info';

    render(summary: CoverageSummary): string {
        return summary.files.map((file) => this.renderFile(file)).join('');
    }

    private renderFile(file: FileSummary): string {
        const out: string[] = ['TN:', `SF:${file.path}`];

        // FN names must be unique per file; repeated names get their line
        const seen = new Map<string, number>();
        for (const fn of file.functions) {
            seen.set(fn.name, (seen.get(fn.name) ?? 0) + 1);
        }
        const functionName = (fn: FunctionSummary) => {
            const name = fn.name && seen.get(fn.name) === 1 ? fn.name : `${fn.name || '<anonymous>'}@${fn.definedLine}`;
            return name.replace(/,/g, ';');
        };
        for (const fn of file.functions) {
            out.push(`FN:${fn.definedLine},${functionName(fn)}`);
        }
        for (const fn of file.functions) {
            out.push(`FNDA:${fn.executionCount},${functionName(fn)}`);
        }
        out.push(`FNF:${file.functions.length}`);
        out.push(`FNH:${file.functions.filter((fn) => fn.executionCount > 0).length}`);

        if (file.conditions.length > 0) {
            let hit = 0;
            for (const condition of file.conditions) {
                const evaluated = condition.trueCount + condition.falseCount > 0;
                const taken = [condition.trueCount, condition.falseCount];
                taken.forEach((count, branch) => {
                    out.push(`BRDA:${condition.line},${condition.index},${branch},${evaluated ? count : '-'}`);
                    if (count > 0) hit++;
                });
            }
            out.push(`BRF:${file.conditions.length * 2}`);
            out.push(`BRH:${hit}`);
        }

        for (const line of file.lines) {
            if (line.state !== 'not-executable') {
                out.push(`DA:${line.line},${line.executionCount}`);
            }
        }
        out.push(`LF:${file.executableLines}`);
        out.push(`LH:${file.executedLines}`);
        out.push('end_of_record');

        return out.join('\n') + '\n';
    }
}
