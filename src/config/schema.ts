/**
 * Configuration for a coverage session and the reports written from it
 */
export interface CoverageConfig {
    track_blocks: boolean;
    track_conditions: boolean;
    include_patterns: string[];
    exclude_patterns: string[];
    /** Absolute paths under this directory are tracked relative to it */
    root_dir?: string;
    /** Minimum coverage percentage (0-100); 0 disables the check */
    threshold: number;
    report: {
        formats: string[];
        output_dir: string;
    };
}

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: CoverageConfig = {
    track_blocks: true,
    track_conditions: false,
    include_patterns: ['**/*.lua'],
    exclude_patterns: [
        '**/node_modules/**',
        '**/vendor/**',
        '**/tests/**',
        '**/test/**',
        '**/*_test.lua',
        '**/*_spec.lua',
    ],
    threshold: 0,
    report: {
        formats: ['summary', 'lcov'],
        output_dir: './coverage',
    },
};
