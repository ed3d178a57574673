import { ConfigLoader } from './config/ConfigLoader';
import { discoverSources } from './discovery/SourceDiscovery';
import { CoverageEngine } from './engine/CoverageEngine';
import { CoverageSummary } from './models/CoverageModels';
import logger from './utils/logger';

/**
 * Main entry point for programmatic usage: register every source under
 * `rootDir` in a fresh session and write its reports. Nothing is executed,
 * so the result is the zero-coverage baseline.
 */
export async function runBaseline(
    rootDir: string,
    configPath?: string
): Promise<{ summary: CoverageSummary; reports: Record<string, string> }> {
    try {
        const config = await new ConfigLoader().load(configPath);
        const sources = await discoverSources(rootDir, config);

        const engine = new CoverageEngine();
        const session = engine.start({ ...config, root_dir: rootDir });
        for (const source of sources) {
            session.registerFile(source.path, source.source);
        }

        const reports = await engine.report(session);
        return { summary: session.summary(), reports };
    } catch (error) {
        logger.error(`Baseline failed: ${error}`);
        throw error;
    }
}

// Export main components for library usage
export { analyze, classify, isExecutableKind, splitLines } from './classifier/LineClassifier';
export type { BlockDefinition, FunctionDefinition, SourceAnalysis } from './classifier/LineClassifier';
export { ConfigLoader, DEFAULT_CONFIG_FILE } from './config/ConfigLoader';
export { mergeWithDefaults, parseConfigObject, validateConfig } from './config/ConfigValidator';
export type { CoverageConfigInput } from './config/ConfigValidator';
export { PathFilter } from './config/PathFilter';
export type { PathDecision } from './config/PathFilter';
export * from './config/schema';
export { discoverSources } from './discovery/SourceDiscovery';
export type { DiscoveredSource } from './discovery/SourceDiscovery';
export { callSiteFromStack, v8CallSiteResolver } from './engine/CallSiteResolver';
export type { CallSite, CallSiteResolver } from './engine/CallSiteResolver';
export { CoverageEngine } from './engine/CoverageEngine';
export { CoverageSession } from './engine/CoverageSession';
export type { CoverageSessionOptions, TrackingEvent } from './engine/CoverageSession';
export { defaultRegistry, SessionRegistry } from './engine/SessionRegistry';
export { meetsThreshold } from './engine/SummaryBuilder';
export * from './errors/CoverageErrors';
export * from './models/CoverageModels';
export { FormatterRegistry } from './reporter/FormatterRegistry';
export { ReportGenerator } from './reporter/ReportGenerator';
export type { ReportFormatter } from './reporter/ReportFormatter';
export { SessionState } from './tracking/SessionControl';
export { SharedTracker } from './tracking/SharedTracker';
export type { SharedFileState, SharedTrackingState } from './tracking/SharedTracker';
