import fs from 'fs/promises';
import path from 'path';
import yaml from 'js-yaml';
import { CoverageConfig } from './schema';
import { CoverageConfigInput, mergeWithDefaults, parseConfigObject, validateConfig } from './ConfigValidator';
import { ConfigurationError } from '../errors/CoverageErrors';
import { fileExists } from '../utils/fileUtils';
import logger from '../utils/logger';

export const DEFAULT_CONFIG_FILE = '.linecov.yml';

export interface ConfigDiagnostics {
    configSource: string;
    overridesApplied: string[];
}

export class ConfigLoader {
    private configSource: string = 'defaults';
    private overridesApplied: string[] = [];

    constructor(private readonly env: NodeJS.ProcessEnv = process.env) { }

    /**
     * Load configuration from file or use defaults
     */
    async load(configPath?: string): Promise<CoverageConfig> {
        let config: CoverageConfigInput = {};

        if (configPath) {
            config = await this.loadFromFile(configPath);
            this.configSource = configPath;
        } else {
            const defaultPath = path.join(process.cwd(), DEFAULT_CONFIG_FILE);
            if (await fileExists(defaultPath)) {
                config = await this.loadFromFile(defaultPath);
                this.configSource = defaultPath;
            }
        }

        const mergedConfig = mergeWithDefaults(config);
        this.applyEnvironmentOverrides(mergedConfig);
        validateConfig(mergedConfig);

        logger.info(`Configuration loaded successfully from: ${this.configSource}`);
        return mergedConfig;
    }

    getDiagnostics(): ConfigDiagnostics {
        return {
            configSource: this.configSource,
            overridesApplied: [...this.overridesApplied],
        };
    }

    /**
     * Read failures fall back to defaults; a readable file with the wrong
     * shape is a configuration error
     */
    private async loadFromFile(filePath: string): Promise<CoverageConfigInput> {
        let content: string;
        try {
            content = await fs.readFile(filePath, 'utf-8');
        } catch (error) {
            logger.warn(`Failed to load config from ${filePath}: ${error}`);
            return {};
        }

        let parsed: unknown;
        try {
            parsed = yaml.load(content);
        } catch (error) {
            throw new ConfigurationError(
                `Invalid YAML in ${filePath}: ${error instanceof Error ? error.message : String(error)}`
            );
        }

        logger.info(`Loaded config from: ${filePath}`);
        return parseConfigObject(parsed);
    }

    private applyEnvironmentOverrides(config: CoverageConfig): void {
        const list = (value: string) => value.split(',').map((entry) => entry.trim()).filter(Boolean);
        const flag = (name: string, value: string): boolean => {
            if (value === 'true' || value === '1') return true;
            if (value === 'false' || value === '0') return false;
            throw new ConfigurationError(`${name} must be true or false, got "${value}"`, name);
        };

        const { env } = this;

        if (env.LINECOV_INCLUDE) {
            config.include_patterns = list(env.LINECOV_INCLUDE);
            this.overridesApplied.push('LINECOV_INCLUDE');
        }
        if (env.LINECOV_EXCLUDE) {
            config.exclude_patterns = list(env.LINECOV_EXCLUDE);
            this.overridesApplied.push('LINECOV_EXCLUDE');
        }
        if (env.LINECOV_TRACK_BLOCKS) {
            config.track_blocks = flag('LINECOV_TRACK_BLOCKS', env.LINECOV_TRACK_BLOCKS);
            this.overridesApplied.push('LINECOV_TRACK_BLOCKS');
        }
        if (env.LINECOV_TRACK_CONDITIONS) {
            config.track_conditions = flag('LINECOV_TRACK_CONDITIONS', env.LINECOV_TRACK_CONDITIONS);
            this.overridesApplied.push('LINECOV_TRACK_CONDITIONS');
        }
        if (env.LINECOV_THRESHOLD) {
            config.threshold = parseFloat(env.LINECOV_THRESHOLD);
            this.overridesApplied.push('LINECOV_THRESHOLD');
        }
        if (env.LINECOV_FORMATS) {
            config.report.formats = list(env.LINECOV_FORMATS);
            this.overridesApplied.push('LINECOV_FORMATS');
        }
        if (env.LINECOV_OUTPUT_DIR) {
            config.report.output_dir = env.LINECOV_OUTPUT_DIR;
            this.overridesApplied.push('LINECOV_OUTPUT_DIR');
        }
    }
}
