import { CoverageConfig, DEFAULT_CONFIG } from './schema';
import { ConfigurationError } from '../errors/CoverageErrors';
import logger from '../utils/logger';

/**
 * Partial configuration as written in a config file or passed to `start()`
 */
export interface CoverageConfigInput extends Partial<Omit<CoverageConfig, 'report'>> {
    report?: Partial<CoverageConfig['report']>;
}

const KNOWN_KEYS = new Set([
    'track_blocks',
    'track_conditions',
    'include_patterns',
    'exclude_patterns',
    'root_dir',
    'threshold',
    'report',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readBoolean(source: Record<string, unknown>, key: string): boolean | undefined {
    const value = source[key];
    if (value === undefined) {
        return undefined;
    }
    if (typeof value !== 'boolean') {
        throw new ConfigurationError(`${key} must be a boolean`, key);
    }
    return value;
}

function readString(source: Record<string, unknown>, key: string): string | undefined {
    const value = source[key];
    if (value === undefined) {
        return undefined;
    }
    if (typeof value !== 'string') {
        throw new ConfigurationError(`${key} must be a string`, key);
    }
    return value;
}

function readNumber(source: Record<string, unknown>, key: string): number | undefined {
    const value = source[key];
    if (value === undefined) {
        return undefined;
    }
    if (typeof value !== 'number') {
        throw new ConfigurationError(`${key} must be a number`, key);
    }
    return value;
}

function readStringList(source: Record<string, unknown>, key: string): string[] | undefined {
    const value = source[key];
    if (value === undefined) {
        return undefined;
    }
    if (!Array.isArray(value)) {
        throw new ConfigurationError(`${key} must be a list of strings`, key);
    }
    return value.map((entry, index) => {
        if (typeof entry !== 'string') {
            throw new ConfigurationError(`${key}[${index}] must be a string`, key);
        }
        return entry;
    });
}

/**
 * Turn a parsed config document into typed input, rejecting wrong types
 */
export function parseConfigObject(raw: unknown): CoverageConfigInput {
    if (raw === undefined || raw === null) {
        return {};
    }
    if (!isRecord(raw)) {
        throw new ConfigurationError('Configuration must be a mapping of keys to values');
    }

    for (const key of Object.keys(raw)) {
        if (!KNOWN_KEYS.has(key)) {
            logger.warn(`Ignoring unknown configuration key: ${key}`);
        }
    }

    const input: CoverageConfigInput = {
        track_blocks: readBoolean(raw, 'track_blocks'),
        track_conditions: readBoolean(raw, 'track_conditions'),
        include_patterns: readStringList(raw, 'include_patterns'),
        exclude_patterns: readStringList(raw, 'exclude_patterns'),
        root_dir: readString(raw, 'root_dir'),
        threshold: readNumber(raw, 'threshold'),
    };

    const report = raw.report;
    if (report !== undefined) {
        if (!isRecord(report)) {
            throw new ConfigurationError('report must be a mapping', 'report');
        }
        input.report = {
            formats: readStringList(report, 'formats'),
            output_dir: readString(report, 'output_dir'),
        };
    }

    return input;
}

/**
 * Merge with default configuration
 */
export function mergeWithDefaults(config: CoverageConfigInput = {}): CoverageConfig {
    return {
        track_blocks: config.track_blocks ?? DEFAULT_CONFIG.track_blocks,
        track_conditions: config.track_conditions ?? DEFAULT_CONFIG.track_conditions,
        include_patterns: [...(config.include_patterns ?? DEFAULT_CONFIG.include_patterns)],
        exclude_patterns: [...(config.exclude_patterns ?? DEFAULT_CONFIG.exclude_patterns)],
        root_dir: config.root_dir ?? DEFAULT_CONFIG.root_dir,
        threshold: config.threshold ?? DEFAULT_CONFIG.threshold,
        report: {
            formats: [...(config.report?.formats ?? DEFAULT_CONFIG.report.formats)],
            output_dir: config.report?.output_dir ?? DEFAULT_CONFIG.report.output_dir,
        },
    };
}

function checkPatterns(patterns: string[], field: string): void {
    patterns.forEach((pattern, index) => {
        if (pattern.trim().length === 0) {
            throw new ConfigurationError(`${field}[${index}] is empty`, field);
        }
        if (pattern.startsWith('!')) {
            throw new ConfigurationError(
                `${field}[${index}] "${pattern}" is a negated pattern; list it under exclude_patterns instead`,
                field
            );
        }
    });
}

/**
 * Reject configurations the engine cannot run with
 */
export function validateConfig(config: CoverageConfig): CoverageConfig {
    checkPatterns(config.include_patterns, 'include_patterns');
    checkPatterns(config.exclude_patterns, 'exclude_patterns');

    const excluded = new Set(config.exclude_patterns);
    const contradictory = config.include_patterns.find((pattern) => excluded.has(pattern));
    if (contradictory !== undefined) {
        throw new ConfigurationError(
            `Pattern "${contradictory}" is listed in both include_patterns and exclude_patterns`,
            'include_patterns'
        );
    }

    if (!Number.isFinite(config.threshold) || config.threshold < 0 || config.threshold > 100) {
        throw new ConfigurationError(`threshold must be between 0 and 100, got ${config.threshold}`, 'threshold');
    }

    if (config.report.formats.some((format) => format.trim().length === 0)) {
        throw new ConfigurationError('report.formats must not contain empty entries', 'report.formats');
    }

    return config;
}
