import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { resolve, join } from 'node:path';
import { readFileSync, existsSync, unlinkSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { main } from '../../src/cli.js';

const FIXTURES_DIR = resolve(import.meta.dirname, '../fixtures/relations');

const UNIVERSITY = resolve(FIXTURES_DIR, 'university.json');
const BCNF = resolve(FIXTURES_DIR, 'bcnf.json');
const MALFORMED = resolve(FIXTURES_DIR, 'malformed.json');
const INVALID = resolve(FIXTURES_DIR, 'invalid-structure.json');

describe('CLI', () => {
  let stdoutOutput: string;
  let stderrOutput: string;
  const tmpFiles: string[] = [];

  beforeEach(() => {
    stdoutOutput = '';
    stderrOutput = '';
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk) => {
      stdoutOutput += String(chunk);
      return true;
    });
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk) => {
      stderrOutput += String(chunk);
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    for (const f of tmpFiles) {
      if (existsSync(f)) unlinkSync(f);
    }
    tmpFiles.length = 0;
  });

  describe('--help', () => {
    it('prints usage and returns 0', () => {
      const code = main(['--help']);
      expect(code).toBe(0);
      expect(stdoutOutput).toContain('Usage: fd-normalizer');
      expect(stdoutOutput).toContain('--input');
      expect(stdoutOutput).toContain('--covers');
      expect(stdoutOutput).toContain('--sample');
    });
  });

  describe('argument validation', () => {
    it('rejects unknown flags with exit code 2', () => {
      expect(main(['--unknown-flag'])).toBe(2);
      expect(stderrOutput).toContain('Use --help for usage');
    });

    it('rejects invalid --format value with exit code 2', () => {
      expect(main(['--input', UNIVERSITY, '--format', 'xml'])).toBe(2);
      expect(stderrOutput).toContain('Invalid format');
    });

    it('rejects invalid --covers value with exit code 2', () => {
      expect(main(['--input', UNIVERSITY, '--covers', 'some'])).toBe(2);
      expect(stderrOutput).toContain('Invalid --covers value "some"');
    });

    it('rejects invalid --fail-on value with exit code 2', () => {
      expect(main(['--input', UNIVERSITY, '--fail-on', '4NF'])).toBe(2);
      expect(stderrOutput).toContain('Invalid --fail-on');
    });

    it('rejects a missing relations file with exit code 2', () => {
      expect(main(['--input', '/nonexistent/relations.json'])).toBe(2);
      expect(stderrOutput).toContain('Relations file not found');
    });
  });

  describe('input errors', () => {
    it('returns 3 for malformed JSON', () => {
      expect(main(['--input', MALFORMED])).toBe(3);
      expect(stderrOutput).toContain('Failed to read relations');
    });

    it('returns 3 for an invalid structure', () => {
      expect(main(['--input', INVALID])).toBe(3);
      expect(stderrOutput).toContain('Failed to read relations');
    });
  });

  describe('output', () => {
    it('writes JSON to stdout by default', () => {
      expect(main(['--input', UNIVERSITY, '--no-timestamp'])).toBe(0);
      const parsed: unknown = JSON.parse(stdoutOutput);
      expect(parsed).toMatchObject({
        metadata: { relationCount: 3, findingCount: 3, timestamp: null, coverMode: 'one' },
      });
    });

    it('pretty-prints JSON', () => {
      main(['--input', BCNF, '--no-timestamp', '--pretty']);
      expect(stdoutOutput.split('\n')[1]).toBe('  "findings": [],');
    });

    it('writes text output', () => {
      expect(main(['--input', UNIVERSITY, '--no-timestamp', '--format', 'text'])).toBe(0);
      expect(stdoutOutput).toContain('=== Functional Dependency Analysis ===');
      expect(stdoutOutput).toContain('  Relation: Employee {deptId, deptName, id}');
      expect(stdoutOutput).toContain('  [ERROR] NF3_TRANSITIVE_DEPENDENCY @ Employee.deptName');
    });

    it('omits relations with --findings-only', () => {
      main(['--input', UNIVERSITY, '--no-timestamp', '--findings-only']);
      const parsed: unknown = JSON.parse(stdoutOutput);
      expect(Object.keys(parsed ?? {})).toEqual(['findings', 'metadata']);
    });

    it('passes the cover mode through', () => {
      main(['--input', BCNF, '--no-timestamp', '--covers', 'all', '--format', 'text']);
      expect(stdoutOutput).toContain('    Minimal covers (1):');
      expect(stdoutOutput).toContain('Covers:    all');
    });

    it('writes to --out instead of stdout', () => {
      const outPath = join(tmpdir(), `fd-normalizer-cli-${String(process.pid)}.json`);
      tmpFiles.push(outPath);
      expect(main(['--input', BCNF, '--no-timestamp', '--out', outPath])).toBe(0);
      expect(stdoutOutput).toBe('');
      const written: unknown = JSON.parse(readFileSync(outPath, 'utf-8'));
      expect(written).toMatchObject({ metadata: { relationCount: 1 } });
    });
  });

  describe('--fail-on', () => {
    it('returns 1 when a relation is below the threshold', () => {
      expect(main(['--input', UNIVERSITY, '--fail-on', '2NF'])).toBe(1);
    });

    it('returns 0 when every relation meets the threshold', () => {
      expect(main(['--input', BCNF, '--fail-on', 'BCNF'])).toBe(0);
    });

    it('still writes the report when failing', () => {
      main(['--input', UNIVERSITY, '--fail-on', '3NF']);
      expect(stdoutOutput).toContain('"findingCount":3');
    });
  });

  describe('sampling', () => {
    it('summarizes random samples as JSON', () => {
      const code = main(['--sample', '3', '--samples', '5', '--seed', '7', '--seconds', '30']);
      expect(code).toBe(0);
      const parsed: unknown = JSON.parse(stdoutOutput);
      expect(parsed).toMatchObject({
        attributeCount: 3,
        distribution: 'uniform',
        summary: { samples: 5 },
      });
    });

    it('writes one line per sample with --verbose', () => {
      main(['--sample', '3', '--samples', '2', '--seed', '7', '--seconds', '30', '--verbose']);
      expect(stderrOutput.split('\n').filter((line) => line.startsWith('Sample #'))).toHaveLength(2);
    });

    it('writes a text summary', () => {
      main(['--sample', '2', '--samples', '4', '--seed', '1', '--seconds', '30', '--format', 'text']);
      expect(stdoutOutput).toContain('=== Sample Rush ===');
      expect(stdoutOutput).toContain('Samples:      4');
    });

    it('accepts the binomial distribution', () => {
      const code = main([
        '--sample', '3', '--samples', '3', '--seed', '2', '--seconds', '30',
        '--distribution', 'binomial', '--probability', '0.3',
      ]);
      expect(code).toBe(0);
      expect(stdoutOutput).toContain('"distribution":"binomial"');
    });

    it('rejects an invalid attribute count', () => {
      expect(main(['--sample', 'many'])).toBe(2);
      expect(stderrOutput).toContain('Invalid --sample value "many"');
    });

    it('rejects an unknown distribution', () => {
      expect(main(['--sample', '3', '--distribution', 'normal'])).toBe(2);
      expect(stderrOutput).toContain('Invalid --distribution value "normal"');
    });

    it('rejects an out-of-range probability', () => {
      expect(main(['--sample', '3', '--distribution', 'binomial', '--probability', '2'])).toBe(2);
      expect(stderrOutput).toContain('Invalid --probability value "2"');
    });
  });
});
