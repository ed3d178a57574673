import { minimatch } from 'minimatch';
import { PathNormalizer } from '../utils/PathNormalizer';

export interface PathDecision {
    path: string;
    included: boolean;
    /** Which list decided; `default` when no pattern applied */
    rule: 'include' | 'exclude' | 'default';
    pattern: string | null;
    /** Include pattern that also matched but lost to the exclude rule */
    overriddenInclude: string | null;
}

export interface PathFilterOptions {
    include: string[];
    exclude: string[];
    rootDir?: string;
}

const MATCH_OPTIONS = { dot: true };

/**
 * Include/exclude decisions for tracked paths. Exclude wins when both lists
 * match; an empty include list admits everything not excluded.
 */
export class PathFilter {
    private readonly decisions = new Map<string, PathDecision>();

    constructor(private readonly options: PathFilterOptions) { }

    normalize(filePath: string): string {
        return PathNormalizer.normalize(filePath, this.options.rootDir);
    }

    decide(filePath: string): PathDecision {
        const cached = this.decisions.get(filePath);
        if (cached) {
            return cached;
        }
        const decision = this.evaluate(this.normalize(filePath));
        this.decisions.set(filePath, decision);
        return decision;
    }

    isIncluded(filePath: string): boolean {
        return this.decide(filePath).included;
    }

    private evaluate(path: string): PathDecision {
        const include = this.options.include.find((pattern) => minimatch(path, pattern, MATCH_OPTIONS)) ?? null;
        const exclude = this.options.exclude.find((pattern) => minimatch(path, pattern, MATCH_OPTIONS)) ?? null;

        if (exclude !== null) {
            return { path, included: false, rule: 'exclude', pattern: exclude, overriddenInclude: include };
        }
        if (include !== null) {
            return { path, included: true, rule: 'include', pattern: include, overriddenInclude: null };
        }
        return {
            path,
            included: this.options.include.length === 0,
            rule: 'default',
            pattern: null,
            overriddenInclude: null,
        };
    }
}
