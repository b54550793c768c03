import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CommanderError } from 'commander';
import { parseCliArgs, run, summarize } from '../src/cli';
import type { RunEnvironment } from '../src/cli';
import { stubAdapter } from './helpers/stub-adapter';

describe('parseCliArgs', () => {
  it('collects positional URLs and defaults the delay to one second', () => {
    expect(parseCliArgs(['https://homes.example.test/1', 'https://homes.example.test/2'])).toEqual({
      urls: ['https://homes.example.test/1', 'https://homes.example.test/2'],
      delay: 1
    });
  });

  it('reads --base-dir and --delay', () => {
    const opts = parseCliArgs(['--base-dir', '/tmp/out', '--delay', '0.25', 'https://homes.example.test/1']);
    expect(opts.baseDir).toBe('/tmp/out');
    expect(opts.delay).toBe(0.25);
    expect(opts.urls).toEqual(['https://homes.example.test/1']);
  });

  it('rejects a negative delay', () => {
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    expect(() => parseCliArgs(['--delay', '-1', 'https://homes.example.test/1'])).toThrow(CommanderError);
  });
});

describe('summarize', () => {
  it('counts outcomes and images', () => {
    const summary = summarize(
      [
        { state: 'skipped', url: 'a' },
        { state: 'failed', url: 'b', status_code: null, error: 'Request timed out' },
        {
          state: 'recorded',
          url: 'c',
          listing: { address: 'x', price: '', description: '' },
          tags: { features: [], styles: [] },
          folder: 'x',
          images: { saved: ['x/img_1.jpg', 'x/img_3.jpg'], failed: [{ url: 'i2', error: 'HTTP 500: OK' }] }
        }
      ],
      65_000
    );
    expect(summary).toEqual({
      total: 3,
      recorded: 1,
      skipped: 1,
      failed: 1,
      images_saved: 2,
      images_failed: 1,
      elapsed_time: '1m 5s'
    });
  });
});

describe('run', () => {
  let dir: string;
  let env: RunEnvironment;

  const LISTING_URL = 'https://homes.example.test/listing/77';

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'listing-cli-'));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    fs.writeFileSync(
      path.join(dir, 'tags.json'),
      JSON.stringify({ architectural_style_tags: ['#victorian'], room_feature_tags: [], unique_feature_tags: [] })
    );
    env = {
      files: {
        config: path.join(dir, 'config.json'),
        ledger: path.join(dir, 'processed_urls.json'),
        tags: path.join(dir, 'tags.json'),
        log: path.join(dir, 'scrape.log')
      },
      timeout: 1000,
      adapter: stubAdapter({
        [LISTING_URL]: {
          body: `<head><meta property="og:title" content="77 Bay Rd">
            <meta property="og:description" content="Restored Victorian"></head>
            <body><img src="/img/hall.png"></body>`
        },
        'https://homes.example.test/img/hall.png': { body: Buffer.from('png'), contentType: 'image/png' }
      })
    };
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('downloads a listing, persists the base dir and ledger, and exits 0', async () => {
    const baseDir = path.join(dir, 'out');

    const code = await run([LISTING_URL, '--base-dir', baseDir, '--delay', '0'], env);

    expect(code).toBe(0);
    expect(fs.readFileSync(path.join(baseDir, '77_Bay_Rd', 'victorian', 'img_1.png'), 'utf-8')).toBe('png');
    expect(JSON.parse(fs.readFileSync(env.files.config, 'utf-8'))).toEqual({ base_dir: baseDir });
    expect(JSON.parse(fs.readFileSync(env.files.ledger, 'utf-8'))).toEqual([LISTING_URL]);
    const log = fs.readFileSync(env.files.log, 'utf-8');
    expect(log).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z INFO Starting run: 1 URL\(s\)/);
    expect(log).toContain(`INFO Fetched data for ${LISTING_URL}: {"address":"77 Bay Rd","price":"","description":"Restored Victorian"}`);
  });

  it('exits 0 when a listing fails to fetch', async () => {
    const code = await run(['https://homes.example.test/listing/404', '--delay', '0'], env);

    expect(code).toBe(0);
    expect(fs.existsSync(env.files.ledger)).toBe(false);
    expect(fs.readFileSync(env.files.log, 'utf-8')).toContain(
      'ERROR Failed to fetch https://homes.example.test/listing/404: DNS lookup failed: https://homes.example.test/listing/404'
    );
  });

  it('uses the persisted base dir when none is given', async () => {
    const saved = path.join(dir, 'saved-root');
    fs.writeFileSync(env.files.config, JSON.stringify({ base_dir: saved }));

    await run([LISTING_URL, '--delay', '0'], env);

    expect(fs.existsSync(path.join(saved, '77_Bay_Rd', 'victorian', 'img_1.png'))).toBe(true);
  });

  it('starts from a config file that has no base_dir', async () => {
    const baseDir = path.join(dir, 'out');
    fs.writeFileSync(env.files.config, JSON.stringify({ theme: 'dark' }));

    const code = await run([LISTING_URL, '--base-dir', baseDir, '--delay', '0'], env);

    expect(code).toBe(0);
    expect(fs.existsSync(path.join(baseDir, '77_Bay_Rd', 'victorian', 'img_1.png'))).toBe(true);
    expect(JSON.parse(fs.readFileSync(env.files.config, 'utf-8'))).toEqual({ theme: 'dark', base_dir: baseDir });
  });

  it('processes URLs that differ only by a trailing slash as separate listings', async () => {
    const baseDir = path.join(dir, 'out');
    const slashUrl = `${LISTING_URL}/`;
    env.adapter = stubAdapter({
      [LISTING_URL]: { body: '<head><meta property="og:title" content="7 A St"></head>' },
      [slashUrl]: { body: '<head><meta property="og:title" content="8 B St"></head>' }
    });

    const code = await run([LISTING_URL, slashUrl, '--base-dir', baseDir, '--delay', '0'], env);

    expect(code).toBe(0);
    expect(fs.readdirSync(baseDir).sort()).toEqual(['7_A_St', '8_B_St']);
    expect(JSON.parse(fs.readFileSync(env.files.ledger, 'utf-8'))).toEqual([LISTING_URL, slashUrl]);
  });

  it('skips an exact repeat through the ledger', async () => {
    const baseDir = path.join(dir, 'out');

    const code = await run([LISTING_URL, LISTING_URL, '--base-dir', baseDir, '--delay', '0'], env);

    expect(code).toBe(0);
    expect(JSON.parse(fs.readFileSync(env.files.ledger, 'utf-8'))).toEqual([LISTING_URL]);
    expect(fs.readFileSync(env.files.log, 'utf-8')).toContain(`INFO Skipping already processed URL: ${LISTING_URL}`);
  });

  it('exits 1 without URLs', async () => {
    expect(await run(['--delay', '0'], env)).toBe(1);
  });

  it('exits 1 and keeps a corrupt ledger', async () => {
    fs.writeFileSync(env.files.ledger, '{not json');

    expect(await run([LISTING_URL, '--delay', '0'], env)).toBe(1);
    expect(fs.readFileSync(env.files.ledger, 'utf-8')).toBe('{not json');
    expect(fs.readFileSync(env.files.log, 'utf-8')).toContain('ERROR Run aborted: Corrupt ledger file');
  });
});
