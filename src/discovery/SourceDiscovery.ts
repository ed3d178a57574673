import path from 'path';
import { PathFilter } from '../config/PathFilter';
import { CoverageConfig } from '../config/schema';
import { findFiles, readFile } from '../utils/fileUtils';
import logger from '../utils/logger';

export interface DiscoveredSource {
    /** Path relative to the discovery root, forward slashes */
    path: string;
    absolutePath: string;
    source: string;
}

/**
 * Find and read every source the configuration includes under `rootDir`.
 * Glob results are re-checked with the session's path filter so discovery
 * and tracking agree on exclude-wins.
 */
export async function discoverSources(
    rootDir: string,
    config: Pick<CoverageConfig, 'include_patterns' | 'exclude_patterns'>
): Promise<DiscoveredSource[]> {
    const filter = new PathFilter({ include: config.include_patterns, exclude: config.exclude_patterns });
    const patterns = config.include_patterns.length > 0 ? config.include_patterns : ['**/*'];

    const candidates = await findFiles(rootDir, patterns, { ignore: config.exclude_patterns });
    const sources: DiscoveredSource[] = [];

    for (const candidate of candidates) {
        const decision = filter.decide(candidate);
        if (!decision.included) {
            logger.debug(`Skipping ${candidate}: ${decision.rule} rule ${decision.pattern ?? '(none)'}`);
            continue;
        }
        const absolutePath = path.resolve(rootDir, candidate);
        sources.push({ path: decision.path, absolutePath, source: await readFile(absolutePath) });
    }

    logger.info(`Discovered ${sources.length} source file(s) under ${rootDir}`);
    return sources;
}
