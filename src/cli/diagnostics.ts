import { ConfigDiagnostics } from '../config/ConfigLoader';
import { CoverageConfig } from '../config/schema';

/**
 * Print the resolved configuration and where it came from
 */
export function printStartupDiagnostics(config: CoverageConfig, diagnostics: ConfigDiagnostics): void {
    console.log('=== Configuration ===');
    console.log(`Source: ${diagnostics.configSource}`);
    console.log(
        `Environment overrides: ${diagnostics.overridesApplied.length > 0 ? diagnostics.overridesApplied.join(', ') : 'none'}`
    );
    console.log(`Include: ${config.include_patterns.join(', ') || '(everything)'}`);
    console.log(`Exclude: ${config.exclude_patterns.join(', ') || '(nothing)'}`);
    console.log(`Track blocks: ${config.track_blocks}, track conditions: ${config.track_conditions}`);
    console.log(`Threshold: ${config.threshold}%`);
    console.log(`Reports: ${config.report.formats.join(', ')} -> ${config.report.output_dir}`);
    console.log('');
}
