/**
 * Tests for file-level extraction
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import {
  DocumentNotFoundError,
  ExtractionFailedError,
  MalformedDocumentError,
  type Logger,
} from '@stig-extract/shared';
import { extract, extractRules } from './extractor.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const fixturesDir = join(__dirname, '..', 'fixtures');

// Logger stub that records calls; child() returns the same stub
function createMockLogger() {
  const logger = {
    debug: vi.fn<(message: string, context?: Record<string, unknown>) => void>(),
    info: vi.fn<(message: string, context?: Record<string, unknown>) => void>(),
    warn: vi.fn<(message: string, context?: Record<string, unknown>) => void>(),
    error: vi.fn<(message: string, context?: Record<string, unknown>) => void>(),
    child: vi.fn<(context: Record<string, unknown>) => Logger>(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}

describe('extractRules', () => {
  let logger: ReturnType<typeof createMockLogger>;

  beforeEach(() => {
    logger = createMockLogger();
  });

  describe('successful extraction', () => {
    it('should return records, namespace and fingerprint', () => {
      const path = join(fixturesDir, 'stig-default-ns.xml');
      const result = extractRules(path, { logger });

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.path).toBe(path);
        expect(result.records).toHaveLength(4);
        expect(result.namespace).toBe('http://checklists.nist.gov/xccdf/1.1');
        expect(result.fingerprint).toMatch(/^sha256:[a-f0-9]{64}$/);
      }
    });

    it('should log the record count at info level', () => {
      extractRules(join(fixturesDir, 'stig-default-ns.xml'), { logger });

      expect(logger.child).toHaveBeenCalledWith({ path: join(fixturesDir, 'stig-default-ns.xml') });
      expect(logger.info).toHaveBeenCalledWith('Parsed 4 STIG rules', {
        namespace: 'http://checklists.nist.gov/xccdf/1.1',
      });
      expect(logger.error).not.toHaveBeenCalled();
    });

    it('should distinguish a valid document without rules from a failure', () => {
      const result = extractRules(join(fixturesDir, 'stig-empty.xml'), { logger });

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.records).toEqual([]);
        expect(result.benchmark.id).toBe('Empty_STIG');
      }
    });

    it('should be idempotent on an unchanged file', () => {
      const path = join(fixturesDir, 'stig-prefixed-ns.xml');
      const first = extractRules(path, { logger });
      const second = extractRules(path, { logger });

      expect(second).toEqual(first);
      if (first.ok && second.ok) {
        expect(second.fingerprint).toBe(first.fingerprint);
      }
    });

    it('should give prefixed and default-namespace documents the same fingerprint', () => {
      const prefixed = extractRules(join(fixturesDir, 'stig-prefixed-ns.xml'), { logger });
      const unprefixed = extractRules(join(fixturesDir, 'stig-default-ns.xml'), { logger });

      expect(prefixed.ok && unprefixed.ok && prefixed.fingerprint === unprefixed.fingerprint).toBe(true);
    });
  });

  describe('failures', () => {
    let workDir: string;

    beforeEach(() => {
      workDir = mkdtempSync(join(tmpdir(), 'stig-extract-'));
    });

    afterEach(() => {
      rmSync(workDir, { recursive: true, force: true });
    });

    it('should report a missing file as not-found without throwing', () => {
      const path = join(workDir, 'missing.xml');
      const result = extractRules(path, { logger });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.kind).toBe('not-found');
        expect(result.error).toBeInstanceOf(DocumentNotFoundError);
        expect(result.error.message).toBe(`XML file not found at ${path}`);
        expect(result.diagnostics.map((d) => d.code)).toEqual(['XCCDF-NOT-FOUND']);
      }
      expect(logger.error).toHaveBeenCalledWith(`XML file not found at ${path}`);
    });

    it('should report an unclosed tag as malformed', () => {
      const result = extractRules(join(fixturesDir, 'malformed.xml'), { logger });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.kind).toBe('malformed');
        expect(result.error).toBeInstanceOf(MalformedDocumentError);
        expect(result.diagnostics[0]?.code).toBe('XCCDF-MALFORMED');
        expect(result.diagnostics[0]?.location).toBe(join(fixturesDir, 'malformed.xml'));
      }
      expect(logger.error).toHaveBeenCalledTimes(1);
    });

    it('should report text that is not XML as malformed', () => {
      const path = join(workDir, 'notes.xml');
      writeFileSync(path, 'This is not XML');

      const result = extractRules(path, { logger });

      expect(!result.ok && result.kind).toBe('malformed');
    });

    it('should report an unreadable path as unexpected', () => {
      const result = extractRules(workDir, { logger });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.kind).toBe('unexpected');
        expect(result.error).toBeInstanceOf(ExtractionFailedError);
        expect(result.error.message).toMatch(/^An unexpected error occurred during parsing: /);
        expect(result.diagnostics[0]?.code).toBe('XCCDF-UNEXPECTED');
      }
    });

    it('should log namespace warnings for a document without a namespace', () => {
      const path = join(workDir, 'plain.xml');
      writeFileSync(path, '<Benchmark><Group id="G1"><Rule id="R1"/></Group></Benchmark>');

      const result = extractRules(path, { logger });

      expect(result.ok).toBe(true);
      expect(logger.warn).toHaveBeenCalledWith(
        'No XCCDF namespace declared on the root element - matching un-namespaced elements',
        { code: 'XCCDF-NS-UNDECLARED' },
      );
    });
  });
});

describe('extract', () => {
  it('should return the records of a well-formed document', () => {
    const records = extract(join(fixturesDir, 'stig-missing-fields.xml'), { logger: createMockLogger() });

    expect(records.map((r) => r.ruleId)).toEqual(['SV-200001r1_rule', 'SV-200002r1_rule']);
  });

  it('should return an empty array for a path that does not exist', () => {
    expect(extract(join(fixturesDir, 'does-not-exist.xml'), { logger: createMockLogger() })).toEqual([]);
  });

  it('should return an empty array for a malformed document', () => {
    expect(extract(join(fixturesDir, 'malformed.xml'), { logger: createMockLogger() })).toEqual([]);
  });

  it('should return equal sequences on repeated calls', () => {
    const path = join(fixturesDir, 'stig-default-ns.xml');
    expect(extract(path, { logger: createMockLogger() })).toEqual(extract(path, { logger: createMockLogger() }));
  });
});
