/**
 * app-catalog.test.ts
 *
 * Scans throwaway application and PATH directories and checks which entries
 * become apps, which are skipped, and when the JSON cache is used.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { discoverApplications, loadAppCatalog, readAppCache } from '../app-catalog.js';
import { ConfigurationError } from '../errors.js';

function writeDesktopFile(dir: string, fileName: string, lines: string[]): void {
  fs.writeFileSync(path.join(dir, fileName), ['[Desktop Entry]', ...lines].join('\n'), 'utf-8');
}

function writeExecutable(dir: string, name: string, mode = 0o755): void {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, '#!/bin/sh\n', 'utf-8');
  fs.chmodSync(filePath, mode);
}

describe('app catalog', () => {
  let tempDir: string;
  let appsDir: string;
  let binDir: string;
  let otherBinDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'app-catalog-'));
    appsDir = path.join(tempDir, 'applications');
    binDir = path.join(tempDir, 'bin');
    otherBinDir = path.join(tempDir, 'more-bin');
    for (const dir of [appsDir, binDir, otherBinDir]) fs.mkdirSync(dir);

    writeDesktopFile(appsDir, 'firefox.desktop', ['Type=Application', 'Name=Firefox', 'Exec=/usr/bin/firefox %u']);
    writeDesktopFile(appsDir, 'htop.desktop', ['Type=Application', 'Name=htop', 'Exec=htop', 'Terminal=true']);
    writeDesktopFile(appsDir, 'hidden.desktop', ['Type=Application', 'Name=Secret', 'Exec=secret', 'NoDisplay=true']);
    writeDesktopFile(appsDir, 'link.desktop', ['Type=Link', 'Name=Website', 'URL=https://example.com']);
    fs.writeFileSync(path.join(appsDir, 'notes.txt'), 'not an entry', 'utf-8');

    writeExecutable(binDir, 'firefox');
    writeExecutable(binDir, 'htop');
    writeExecutable(binDir, 'btop');
    writeExecutable(binDir, 'readme', 0o644);
    writeExecutable(binDir, 'tool.sh');
    writeExecutable(otherBinDir, 'btop');
    writeExecutable(otherBinDir, 'zsh');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('collects desktop entries, then uncovered $PATH executables as terminal apps', async () => {
    const records = await discoverApplications({
      applicationDirectories: [appsDir, path.join(tempDir, 'missing')],
      pathVariable: [binDir, otherBinDir].join(path.delimiter),
    });

    expect(records).toEqual([
      { id: path.join(appsDir, 'firefox.desktop'), name: 'Firefox', exec: '/usr/bin/firefox %u', terminal: false },
      { id: path.join(appsDir, 'htop.desktop'), name: 'htop', exec: 'htop', terminal: true },
      { id: path.join(binDir, 'btop'), name: 'btop', exec: 'btop', terminal: true },
      { id: path.join(otherBinDir, 'zsh'), name: 'zsh', exec: 'zsh', terminal: true },
    ]);
  });

  it('can skip the $PATH scan', async () => {
    const records = await discoverApplications({
      applicationDirectories: [appsDir],
      pathVariable: binDir,
      scanPathExecutables: false,
    });
    expect(records.map((record) => record.name)).toEqual(['Firefox', 'htop']);
  });

  it('fails when no source can be read at all', async () => {
    await expect(
      discoverApplications({ applicationDirectories: [path.join(tempDir, 'missing')], pathVariable: '' })
    ).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('serves later loads from the cache until a rebuild is requested', async () => {
    const cachePath = path.join(tempDir, 'cache', 'apps.json');
    const options = { applicationDirectories: [appsDir], scanPathExecutables: false, cachePath };

    expect((await loadAppCatalog(options)).map((record) => record.name)).toEqual(['Firefox', 'htop']);
    expect(readAppCache(cachePath)?.length).toBe(2);

    fs.rmSync(path.join(appsDir, 'htop.desktop'));
    expect((await loadAppCatalog(options)).map((record) => record.name)).toEqual(['Firefox', 'htop']);
    expect((await loadAppCatalog({ ...options, rebuild: true })).map((record) => record.name)).toEqual(['Firefox']);
    expect(readAppCache(cachePath)?.length).toBe(1);
  });

  it('ignores a cache with an unknown layout', () => {
    const cachePath = path.join(tempDir, 'apps.json');
    fs.writeFileSync(cachePath, JSON.stringify({ version: 99, apps: [] }), 'utf-8');
    expect(readAppCache(cachePath)).toBeNull();
    fs.writeFileSync(cachePath, 'garbage', 'utf-8');
    expect(readAppCache(cachePath)).toBeNull();
  });
});
