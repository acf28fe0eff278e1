import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { DEFAULT_BASE_URL, loadConfig, redactApiKey } from '../src/cost-reporter/config';
import { AuthError } from '../src/cost-reporter/errors';

describe('loadConfig', () => {
  let homeDir: string;

  beforeEach(() => {
    homeDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cost-report-'));
  });

  afterEach(() => {
    fs.rmSync(homeDir, { recursive: true, force: true });
  });

  function writeEnvFile(contents: string): void {
    fs.writeFileSync(path.join(homeDir, '.env'), contents);
  }

  it('reads a quoted key from ~/.env', () => {
    writeEnvFile('OTHER=1\nANTHROPIC_ADMIN_KEY="test-admin-key"\n');

    expect(loadConfig({}, homeDir)).toEqual({ apiKey: 'test-admin-key', baseUrl: DEFAULT_BASE_URL });
  });

  it('prefers the process environment over the file', () => {
    writeEnvFile("ANTHROPIC_ADMIN_KEY='file-key'\n");

    expect(loadConfig({ ANTHROPIC_ADMIN_KEY: 'env-key' }, homeDir).apiKey).toBe('env-key');
  });

  it('does not leak file values into process.env', () => {
    writeEnvFile('ANTHROPIC_ADMIN_KEY=test-admin-key\nCOST_REPORT_TEST_ONLY=1\n');

    loadConfig({}, homeDir);

    expect(process.env.COST_REPORT_TEST_ONLY).toBeUndefined();
  });

  it('fails with AuthError when no key is found', () => {
    expect(() => loadConfig({}, homeDir)).toThrow(AuthError);
    expect(() => loadConfig({}, homeDir)).toThrow(
      `ANTHROPIC_ADMIN_KEY not found in the environment or in ${path.join(homeDir, '.env')}`
    );
  });

  it('falls back to the file when the environment variable is blank', () => {
    writeEnvFile('ANTHROPIC_ADMIN_KEY=test-admin-key\n');

    expect(loadConfig({ ANTHROPIC_ADMIN_KEY: '' }, homeDir).apiKey).toBe('test-admin-key');
    expect(loadConfig({ ANTHROPIC_ADMIN_KEY: '   ' }, homeDir).apiKey).toBe('test-admin-key');
  });

  it('treats a blank key as missing', () => {
    writeEnvFile('ANTHROPIC_ADMIN_KEY=\n');

    expect(() => loadConfig({}, homeDir)).toThrow(AuthError);
  });

  it('accepts a loopback base URL over plain HTTP', () => {
    const config = loadConfig(
      { ANTHROPIC_ADMIN_KEY: 'test-key', ANTHROPIC_BASE_URL: 'http://localhost:9000/' },
      homeDir
    );

    expect(config.baseUrl).toBe('http://localhost:9000');
  });

  it.each(['http://api.example.com', 'not a url'])('rejects the base URL %s', (baseUrl) => {
    expect(() => loadConfig({ ANTHROPIC_ADMIN_KEY: 'test-key', ANTHROPIC_BASE_URL: baseUrl }, homeDir)).toThrow(
      z.ZodError
    );
  });
});

describe('redactApiKey', () => {
  it('keeps only a short prefix', () => {
    expect(redactApiKey('test-secret')).toBe('test***');
    expect(redactApiKey('abc')).toBe('***');
  });
});
