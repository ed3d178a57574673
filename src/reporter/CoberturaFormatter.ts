import path from 'path';
import { Builder } from 'xml2js';
import { CoverageSummary, FileSummary, FunctionSummary } from '../models/CoverageModels';
import { ReportFormatter } from './ReportFormatter';

function rate(covered: number, total: number): string {
    return (total > 0 ? covered / total : 1).toFixed(4);
}

function branchCounts(file: FileSummary): { valid: number; covered: number } {
    let covered = 0;
    for (const condition of file.conditions) {
        if (condition.trueCount > 0) covered++;
        if (condition.falseCount > 0) covered++;
    }
    return { valid: file.conditions.length * 2, covered };
}

/**
 * Cobertura XML. Line rates use executed lines, which is what consumers of
 * the format expect from "hits".
 */
export class CoberturaFormatter implements ReportFormatter {
    readonly name = 'cobertura';
    readonly extension = 'xml';

    private readonly builder = new Builder({
        xmldec: { version: '1.0', encoding: 'UTF-8' },
        renderOpts: { pretty: true, indent: '  ', newline: '\n' },
    });

    render(summary: CoverageSummary): string {
        const packages = new Map<string, FileSummary[]>();
        for (const file of summary.files) {
            const dir = path.posix.dirname(file.path);
            const group = packages.get(dir) ?? [];
            group.push(file);
            packages.set(dir, group);
        }

        const branches = summary.files.map(branchCounts);
        const branchesValid = branches.reduce((total, b) => total + b.valid, 0);
        const branchesCovered = branches.reduce((total, b) => total + b.covered, 0);

        const document = {
            coverage: {
                $: {
                    'line-rate': rate(summary.executedLines, summary.executableLines),
                    'branch-rate': rate(branchesCovered, branchesValid),
                    'lines-covered': String(summary.executedLines),
                    'lines-valid': String(summary.executableLines),
                    'branches-covered': String(branchesCovered),
                    'branches-valid': String(branchesValid),
                    complexity: '0',
                    version: '1.9',
                },
                sources: { source: ['.'] },
                packages: {
                    package: [...packages.keys()].sort().map((dir) => this.renderPackage(dir, packages.get(dir) ?? [])),
                },
            },
        };

        return this.builder.buildObject(document) + '\n';
    }

    private renderPackage(dir: string, files: FileSummary[]) {
        const executable = files.reduce((total, file) => total + file.executableLines, 0);
        const executed = files.reduce((total, file) => total + file.executedLines, 0);
        const branches = files.map(branchCounts);
        return {
            $: {
                name: dir === '.' ? '' : dir.replace(/\//g, '.'),
                'line-rate': rate(executed, executable),
                'branch-rate': rate(
                    branches.reduce((total, b) => total + b.covered, 0),
                    branches.reduce((total, b) => total + b.valid, 0)
                ),
                complexity: '0',
            },
            classes: { class: files.map((file) => this.renderClass(file)) },
        };
    }

    private renderClass(file: FileSummary) {
        const branches = branchCounts(file);
        return {
            $: {
                name: path.posix.basename(file.path).replace(/\.[^.]*$/, ''),
                filename: file.path,
                'line-rate': rate(file.executedLines, file.executableLines),
                'branch-rate': rate(branches.covered, branches.valid),
                complexity: '0',
            },
            methods: { method: file.functions.map((fn) => this.renderMethod(file, fn)) },
            lines: { line: this.renderLines(file, 1, file.totalLines) },
        };
    }

    private renderMethod(file: FileSummary, fn: FunctionSummary) {
        return {
            $: {
                name: fn.name || fn.id,
                signature: '()',
                'line-rate': rate(fn.executedLines, fn.executableLines),
                'branch-rate': '1.0000',
            },
            lines: { line: this.renderLines(file, fn.definedLine, fn.endLine) },
        };
    }

    private renderLines(file: FileSummary, from: number, to: number) {
        return file.lines
            .filter((line) => line.line >= from && line.line <= to && line.state !== 'not-executable')
            .map((line) => {
                const conditions = file.conditions.filter((condition) => condition.line === line.line);
                if (conditions.length === 0) {
                    return { $: { number: String(line.line), hits: String(line.executionCount), branch: 'false' } };
                }
                const covered = conditions.reduce(
                    (total, c) => total + (c.trueCount > 0 ? 1 : 0) + (c.falseCount > 0 ? 1 : 0),
                    0
                );
                const valid = conditions.length * 2;
                return {
                    $: {
                        number: String(line.line),
                        hits: String(line.executionCount),
                        branch: 'true',
                        'condition-coverage': `${Math.round((covered / valid) * 100)}% (${covered}/${valid})`,
                    },
                };
            });
    }
}
