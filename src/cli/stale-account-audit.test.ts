import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { CommanderError } from 'commander';
import { config as loadEnv } from 'dotenv';
import { configureDiagnosticLog, flushLogger, logger } from '@/utils/logger';
import {
  ACCOUNTS_PATH,
  LOGS_PATH,
  createMockedApi,
  createRecordingReporter,
  createRecordingSleeper,
  logOnEntry,
  rawAccount
} from '@/test/test-helpers';
import { buildProgram, main, runAudit } from './stale-account-audit';

jest.mock('dotenv');

describe('stale-account-audit CLI', () => {
  describe('buildProgram', () => {
    function quietProgram() {
      return buildProgram()
        .exitOverride()
        .configureOutput({ writeErr: () => undefined, writeOut: () => undefined });
    }

    it('should read the token option', () => {
      const program = quietProgram().parse(['--token', 'test-token'], { from: 'user' });
      expect(program.opts()).toEqual({ token: 'test-token' });
    });

    it('should accept the short flag', () => {
      const program = quietProgram().parse(['-t', 'test-token'], { from: 'user' });
      expect(program.opts()).toEqual({ token: 'test-token' });
    });

    it('should refuse to run without a token', () => {
      expect(() => quietProgram().parse([], { from: 'user' })).toThrow(CommanderError);
    });
  });

  describe('runAudit', () => {
    const now = () => new Date('2024-06-01T00:00:00Z');
    let tmpDir: string;

    beforeEach(async () => {
      tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'audit-cli-'));
    });

    afterEach(async () => {
      await fs.rm(tmpDir, { recursive: true, force: true });
    });

    it('should exit 0 after a completed run', async () => {
      const { client, mock } = createMockedApi();
      const { sleeper } = createRecordingSleeper();
      const reporter = createRecordingReporter();

      mock
        .onGet(ACCOUNTS_PATH).replyOnce(200, { items: [rawAccount('u1', 'a@x.com', 'Admin')] })
        .onGet(LOGS_PATH).replyOnce(200, { items: [logOnEntry('u1', '2023-11-01T00:00:00Z')] });

      const code = await runAudit('test-token', {
        env: {},
        cwd: tmpDir,
        overrides: { client, sleeper, reporter, now }
      });

      expect(code).toBe(0);
      expect(configureDiagnosticLog).toHaveBeenCalledWith(path.join(tmpDir, 'error.log'), 'warn');
      expect(await fs.readFile(path.join(tmpDir, 'filtered_accounts_report.csv'), 'utf-8')).toBe(
        'UserId,RoleName,RequestType\na@x.com,Admin,Remove\n'
      );
    });

    it('should exit 1 and point at the diagnostic log when the directory fetch fails', async () => {
      const { client, mock } = createMockedApi();
      const { sleeper } = createRecordingSleeper();
      const reporter = createRecordingReporter();

      mock.onGet(ACCOUNTS_PATH).reply(401);

      const code = await runAudit('test-token', {
        env: {},
        cwd: tmpDir,
        overrides: { client, sleeper, reporter, now }
      });

      expect(code).toBe(1);
      expect(reporter.error).toHaveBeenCalledWith(`Error fetching IAM accounts. Check ${path.join(tmpDir, 'error.log')}`);
      expect(mock.history.get).toHaveLength(1);
    });

    it('should exit 1 on invalid configuration without calling the API', async () => {
      const { client, mock } = createMockedApi();
      const reporter = createRecordingReporter();

      const code = await runAudit('test-token', {
        env: { AUDIT_LOGIN_STRATEGY: 'sometimes' },
        cwd: tmpDir,
        overrides: { client, reporter }
      });

      expect(code).toBe(1);
      expect(reporter.error).toHaveBeenCalledWith(
        expect.stringMatching(/^Invalid configuration for AUDIT_LOGIN_STRATEGY: /)
      );
      expect(mock.history.get).toHaveLength(0);
      expect(configureDiagnosticLog).not.toHaveBeenCalled();
    });

    it('should exit 1 for a blank token', async () => {
      const reporter = createRecordingReporter();

      expect(await runAudit('   ', { env: {}, overrides: { reporter } })).toBe(1);
      expect(reporter.error).toHaveBeenCalledWith('An API token is required');
    });
  });

  describe('main', () => {
    it('should flush the diagnostic log and exit 1 when the run aborts', async () => {
      const consoleError = jest.spyOn(console, 'error').mockImplementation(() => undefined);
      jest.mocked(loadEnv).mockImplementationOnce(() => {
        throw new Error('environment file unreadable');
      });

      const code = await main(['node', 'stale-account-audit', '--token', 'test-token']);

      expect(code).toBe(1);
      expect(flushLogger).toHaveBeenCalledTimes(1);
      expect(logger.error).toHaveBeenCalledWith('Audit run aborted', expect.any(Error));
      expect(consoleError).toHaveBeenCalledWith('Audit run aborted. Check the diagnostic log for details.');
      consoleError.mockRestore();
    });
  });
});
