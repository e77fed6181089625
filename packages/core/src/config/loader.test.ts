import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { ConfigError } from '@diffwatch/shared';
import { ConfigLoader } from './loader';

const baseEnv: NodeJS.ProcessEnv = {
  REPO_URL: 'https://git.example.com/org/myrepo.git',
  PERSONAL_TOKEN: 'test-token',
  DB_FILE: './data/scans.db',
  BASE_LLM_API: 'http://llm.test:11434',
  LLM_API_KEY: 'test-key',
  SMTP_SERVER: 'smtp.example.com',
  SMTP_USERNAME: 'mailer',
  SMTP_PASSWORD: 'test-secret',
  FROM_EMAIL: 'diffwatch@example.com',
  TO_EMAIL: 'sec@example.com',
};

describe('ConfigLoader', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'config-loader-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  const writeYaml = (content: unknown): string => {
    const file = path.join(tmpDir, 'diffwatch.yaml');
    fs.writeFileSync(file, typeof content === 'string' ? content : yaml.dump(content));
    return file;
  };

  describe('load', () => {
    it('builds the config from environment variables and applies defaults', () => {
      const config = ConfigLoader.load({ env: baseEnv });

      expect(config).toEqual({
        repository: {
          url: 'https://git.example.com/org/myrepo.git',
          token: 'test-token',
          branch: 'main',
          mirrorDir: './repos',
        },
        git: { timeoutMs: 300_000 },
        checkpoint: { dbPath: './data/scans.db', lookbackDays: 10 },
        analysis: {
          baseUrl: 'http://llm.test:11434',
          endpoint: '/v1/chat/completions',
          apiKey: 'test-key',
          model: 'llama3.2-cybersec:latest',
          timeoutMs: 120_000,
        },
        project: { description: '' },
        smtp: {
          host: 'smtp.example.com',
          port: 587,
          username: 'mailer',
          password: 'test-secret',
          from: 'diffwatch@example.com',
          timeoutMs: 60_000,
        },
        notification: { to: 'sec@example.com' },
      });
    });

    it('coerces numeric environment values', () => {
      const config = ConfigLoader.load({
        env: { ...baseEnv, SMTP_PORT: '2525', SCAN_LOOKBACK_DAYS: '3', LLM_TIMEOUT_MS: '1000' },
      });
      expect(config.smtp.port).toBe(2525);
      expect(config.checkpoint.lookbackDays).toBe(3);
      expect(config.analysis.timeoutMs).toBe(1000);
    });

    it('accepts the legacy project description spelling', () => {
      expect(ConfigLoader.load({ env: { ...baseEnv, PROJECT_DESCRPTION: 'legacy' } }).project.description).toBe(
        'legacy',
      );
      expect(
        ConfigLoader.load({ env: { ...baseEnv, PROJECT_DESCRPTION: 'legacy', PROJECT_DESCRIPTION: 'current' } })
          .project.description,
      ).toBe('current');
    });

    it('treats empty environment values as unset', () => {
      const config = ConfigLoader.load({ env: { ...baseEnv, REPO_BRANCH: '', LLM_MODEL: '' } });
      expect(config.repository.branch).toBe('main');
      expect(config.analysis.model).toBe('llama3.2-cybersec:latest');
    });

    it('should respect precedence: flags > env > file', () => {
      const file = writeYaml({
        repository: { branch: 'from-file', mirrorDir: '/srv/mirrors' },
        analysis: { model: 'file-model' },
      });

      const config = ConfigLoader.load({
        configPath: file,
        env: { ...baseEnv, REPO_BRANCH: 'from-env', LLM_MODEL: 'env-model' },
        flags: { repository: { branch: 'from-flag' } },
      });

      expect(config.repository.branch).toBe('from-flag');
      expect(config.repository.mirrorDir).toBe('/srv/mirrors');
      expect(config.analysis.model).toBe('env-model');
    });

    it('lists every validation issue', () => {
      expect(() => ConfigLoader.load({ env: {} })).toThrow(ConfigError);
      try {
        ConfigLoader.load({ env: { ...baseEnv, LLM_API_KEY: undefined, TO_EMAIL: undefined } });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigError);
        expect(String(error instanceof Error ? error.message : error)).toBe(
          'Configuration validation failed:\n- analysis.apiKey: Required\n- notification.to: Required',
        );
      }
    });

    it('reads an env file beneath the real environment', () => {
      const envFile = path.join(tmpDir, '.env');
      fs.writeFileSync(
        envFile,
        ['LLM_API_KEY=test-key-from-file', 'LLM_MODEL="file-model"', 'REPO_BRANCH=from-file', ''].join('\n'),
      );

      const config = ConfigLoader.load({
        envFile,
        env: { ...baseEnv, LLM_API_KEY: undefined, REPO_BRANCH: 'from-env', LLM_MODEL: '' },
      });

      expect(config.analysis.apiKey).toBe('test-key-from-file');
      expect(config.analysis.model).toBe('file-model');
      expect(config.repository.branch).toBe('from-env');
    });

    it('ranks the env file above the config file', () => {
      const file = writeYaml({ repository: { branch: 'from-yaml' } });
      const envFile = path.join(tmpDir, '.env');
      fs.writeFileSync(envFile, 'REPO_BRANCH=from-env-file\n');

      expect(ConfigLoader.load({ configPath: file, envFile, env: baseEnv }).repository.branch).toBe('from-env-file');
    });

    it('ignores a missing env file', () => {
      const config = ConfigLoader.load({ envFile: path.join(tmpDir, 'absent.env'), env: baseEnv });
      expect(config.analysis.apiKey).toBe('test-key');
    });

    it('accepts scp-style repository remotes', () => {
      const config = ConfigLoader.load({ env: { ...baseEnv, REPO_URL: 'git@git.example.com:org/myrepo.git' } });
      expect(config.repository.url).toBe('git@git.example.com:org/myrepo.git');
    });

    it('rejects a repository url that is neither a URL nor an scp-style remote', () => {
      expect(() => ConfigLoader.load({ env: { ...baseEnv, REPO_URL: 'not a remote' } })).toThrow(
        '- repository.url: Repository must be a URL or an scp-style remote (user@host:path)',
      );
    });

    it('throws when the config file is missing', () => {
      expect(() => ConfigLoader.load({ configPath: path.join(tmpDir, 'missing.yaml'), env: baseEnv })).toThrow(
        'Config file not found',
      );
    });
  });

  describe('loadYaml', () => {
    it('returns an empty tree for an empty file', () => {
      expect(ConfigLoader.loadYaml(writeYaml(''))).toEqual({});
    });

    it('throws ConfigError on YAML syntax errors', () => {
      expect(() => ConfigLoader.loadYaml(writeYaml('repository: [unclosed'))).toThrow(ConfigError);
    });

    it('rejects a top-level list', () => {
      expect(() => ConfigLoader.loadYaml(writeYaml('- a\n- b\n'))).toThrow('must contain a mapping');
    });
  });

  describe('mergeConfigs', () => {
    it('merges nested objects and replaces arrays', () => {
      const merged = ConfigLoader.mergeConfigs(
        { a: { b: 1, c: 2 }, list: [1, 2] },
        { a: { c: 3 }, list: [3], skip: undefined },
      );
      expect(merged).toEqual({ a: { b: 1, c: 3 }, list: [3] });
    });
  });
});
