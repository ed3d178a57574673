import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { discoverSources } from '../SourceDiscovery';

jest.mock('../../utils/logger', () => ({
  __esModule: true,
  default: { info: jest.fn(), warn: jest.fn(), debug: jest.fn(), error: jest.fn() },
}));

describe('discoverSources', () => {
  let rootDir: string;

  async function writeSource(relative: string, content: string): Promise<void> {
    const target = path.join(rootDir, relative);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content, 'utf-8');
  }

  beforeEach(async () => {
    rootDir = await fs.mkdtemp(path.join(os.tmpdir(), 'linecov-discovery-'));
    await writeSource('main.lua', 'print(1)\n');
    await writeSource('lib/util.lua', 'return {}\n');
    await writeSource('lib/util_spec.lua', 'describe()\n');
    await writeSource('vendor/dep.lua', 'return 1\n');
    await writeSource('README.md', '# readme\n');
  });

  afterEach(async () => {
    await fs.rm(rootDir, { recursive: true, force: true });
  });

  it('should read every included source, sorted by path', async () => {
    const sources = await discoverSources(rootDir, {
      include_patterns: ['**/*.lua'],
      exclude_patterns: ['vendor/**', '**/*_spec.lua'],
    });

    expect(sources).toEqual([
      { path: 'lib/util.lua', absolutePath: path.join(rootDir, 'lib/util.lua'), source: 'return {}\n' },
      { path: 'main.lua', absolutePath: path.join(rootDir, 'main.lua'), source: 'print(1)\n' },
    ]);
  });

  it('should take every file when there are no include patterns', async () => {
    const sources = await discoverSources(rootDir, { include_patterns: [], exclude_patterns: ['**/*.lua'] });

    expect(sources.map((source) => source.path)).toEqual(['README.md']);
  });
});
