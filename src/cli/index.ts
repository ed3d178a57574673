#!/usr/bin/env node

import * as dotenv from 'dotenv';
import path from 'path';
import { Command } from 'commander';
import { classify, splitLines } from '../classifier/LineClassifier';
import { ConfigLoader } from '../config/ConfigLoader';
import { PathFilter } from '../config/PathFilter';
import { CoverageConfig } from '../config/schema';
import { discoverSources } from '../discovery/SourceDiscovery';
import { CoverageEngine } from '../engine/CoverageEngine';
import { meetsThreshold } from '../engine/SummaryBuilder';
import { readFile } from '../utils/fileUtils';
import logger from '../utils/logger';
import { printStartupDiagnostics } from './diagnostics';

dotenv.config();

export interface ExplainOptions {
    config?: string;
    root?: string;
}

export interface BaselineOptions {
    config?: string;
    output?: string;
    format?: string[];
    threshold?: string;
    verbose?: boolean;
}

const program = new Command();

program
    .name('linecov')
    .description('Line, function and block coverage tracking for Lua sources')
    .version('0.1.0');

program
    .command('classify')
    .description('Print the classification of every line in the given files')
    .argument('<files...>', 'Source files')
    .action(classifyAction);

program
    .command('explain')
    .description('Show the include/exclude decision for each path')
    .argument('<paths...>', 'Paths to check')
    .option('-c, --config <path>', 'Custom config file')
    .option('-r, --root <dir>', 'Directory paths are relative to')
    .action(explainAction);

program
    .command('baseline')
    .description('Register every discovered source in a session and report it without running anything')
    .argument('[dir]', 'Source root', '.')
    .option('-c, --config <path>', 'Custom config file')
    .option('-o, --output <dir>', 'Report output directory')
    .option('-f, --format <formats...>', 'Report formats')
    .option('-t, --threshold <number>', 'Minimum coverage percentage')
    .option('-v, --verbose', 'Print the resolved configuration')
    .action(baselineAction);

async function classifyAction(files: string[]): Promise<void> {
    try {
        for (const file of files) {
            const source = await readFile(file);
            const lines = splitLines(source);
            const kinds = classify(source);
            const width = String(lines.length).length;

            console.log(`File: ${file}`);
            lines.forEach((text, index) => {
                console.log(`${String(index + 1).padStart(width)} ${kinds[index].padEnd(14)} | ${text}`);
            });
        }
    } catch (error) {
        fail('classify', error);
    }
}

async function explainAction(paths: string[], options: ExplainOptions): Promise<void> {
    try {
        const config = await new ConfigLoader().load(options.config);
        const filter = new PathFilter({
            include: config.include_patterns,
            exclude: config.exclude_patterns,
            rootDir: options.root ?? config.root_dir,
        });

        for (const candidate of paths) {
            const decision = filter.decide(candidate);
            let line = `${decision.path}: ${decision.included ? 'included' : 'excluded'}`;
            if (decision.rule === 'default') {
                line += decision.included ? ' (no include patterns)' : ' (no include pattern matched)';
            } else {
                line += ` (${decision.rule} ${decision.pattern})`;
            }
            if (decision.overriddenInclude !== null) {
                line += `, overrides include ${decision.overriddenInclude}`;
            }
            console.log(line);
        }
    } catch (error) {
        fail('explain', error);
    }
}

async function baselineAction(dir: string, options: BaselineOptions): Promise<void> {
    try {
        const rootDir = path.resolve(dir);
        const loader = new ConfigLoader();
        const config = applyCliOptions(await loader.load(options.config), options);

        if (options.verbose) {
            printStartupDiagnostics(config, loader.getDiagnostics());
        }

        const sources = await discoverSources(rootDir, config);
        const engine = new CoverageEngine();
        const session = engine.start({ ...config, root_dir: rootDir });
        for (const source of sources) {
            session.registerFile(source.path, source.source);
        }

        const reports = await engine.report(session);
        const summary = session.summary();

        console.log(engine.render(summary, 'summary'));
        for (const [format, reportPath] of Object.entries(reports)) {
            console.log(`${format} report: ${reportPath}`);
        }

        if (!meetsThreshold(summary, config.threshold)) {
            console.error(`\nCoverage ${summary.coveragePercent}% is below the threshold of ${config.threshold}%`);
            process.exitCode = 1;
        }
    } catch (error) {
        fail('baseline', error);
    }
}

/**
 * Apply CLI options to config
 */
function applyCliOptions(config: CoverageConfig, options: BaselineOptions): CoverageConfig {
    if (options.threshold !== undefined) {
        config.threshold = parseFloat(options.threshold);
    }
    if (options.format && options.format.length > 0) {
        config.report.formats = options.format;
    }
    if (options.output) {
        config.report.output_dir = options.output;
    }
    return config;
}

function fail(command: string, error: unknown): void {
    logger.error(`${command} failed: ${error}`);
    console.error(`\nError: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
}

// Only parse arguments if this module is run directly
if (require.main === module) {
    program.parseAsync().catch((error: unknown) => fail('linecov', error));
}

export { program, applyCliOptions, classifyAction, explainAction, baselineAction };
