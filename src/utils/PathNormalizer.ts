import path from 'path';

/**
 * Normalize file paths so the same source is always tracked under one key
 */
export class PathNormalizer {
    /**
     * Normalize a tracked path: forward slashes, no `./` prefix, no `..` detours,
     * and relative to `rootDir` when the path lives under it
     */
    static normalize(filePath: string, rootDir?: string): string {
        let unixPath = this.toUnixPath(filePath.trim());

        if (rootDir) {
            const unixRoot = path.posix.normalize(this.toUnixPath(rootDir)).replace(/\/+$/, '');
            if (path.posix.isAbsolute(unixPath) && unixRoot.length > 0) {
                const normalized = path.posix.normalize(unixPath);
                if (normalized === unixRoot) {
                    return '.';
                }
                if (normalized.startsWith(`${unixRoot}/`)) {
                    unixPath = normalized.slice(unixRoot.length + 1);
                }
            }
        }

        const normalized = path.posix.normalize(unixPath);
        return normalized.startsWith('./') ? normalized.slice(2) : normalized;
    }

    /**
     * Ensure a path uses forward slashes (for cross-platform consistency in reports)
     */
    static toUnixPath(filePath: string): string {
        return filePath.split(path.sep).join('/').replace(/\\/g, '/');
    }
}
