import { describe, it, expect, vi, beforeEach } from 'vitest';

// Mock executeFile
vi.mock('../../src/utils/shell.js', () => ({
  executeFile: vi.fn(),
}));

// Mock logger
vi.mock('../../src/utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { executeFile } from '../../src/utils/shell.js';
import { logger } from '../../src/utils/logger.js';
import { SandboxExecutor, assertSafeCommand } from '../../src/executors/docker.js';
import {
  DangerousCharacterError,
  ExecutionError,
  InvalidCommandError,
  PermissionDeniedError,
} from '../../src/utils/errors.js';

const mockExecuteFile = vi.mocked(executeFile);

const LABEL_FORMAT = '{{index .Config.Labels "com.ddev.site-name"}}';

function createSandbox(project = 'mysite'): SandboxExecutor {
  return new SandboxExecutor({
    project,
    containerTemplate: 'ddev-{project}-web',
    siteLabel: 'com.ddev.site-name',
    dockerPath: 'docker',
  });
}

function ok(stdout: string) {
  return { stdout, stderr: '', exitCode: 0 };
}

describe('docker sandbox executor', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('assertSafeCommand', () => {
    it('should reject an empty command', () => {
      expect(() => { assertSafeCommand([]); }).toThrow(InvalidCommandError);
      expect(() => { assertSafeCommand([]); }).toThrow('Command must be non-empty list');
    });

    it('should reject a command that is not a list', () => {
      expect(() => { assertSafeCommand('ls -la'); }).toThrow(InvalidCommandError);
      expect(() => { assertSafeCommand(undefined); }).toThrow(InvalidCommandError);
    });

    it('should reject non-string arguments', () => {
      expect(() => { assertSafeCommand(['/bin/bash', 42]); }).toThrow('Argument 1 must be string');
    });

    it.each([';', '|', '&', '>', '<', '$', '`', '\n', '\r'])(
      'should reject %j in the interpreter and flag positions',
      (char) => {
        expect(() => { assertSafeCommand([`/bin/bash${char}`, '-c', 'true']); }).toThrow(DangerousCharacterError);
        expect(() => { assertSafeCommand(['/bin/bash', `-c${char}`, 'true']); }).toThrow(
          'Dangerous character in argument 1'
        );
      }
    );

    it.each([';', '|', '&', '>', '<', '$', '`', '\n', '\r'])(
      'should allow %j in the script position',
      (char) => {
        expect(() => { assertSafeCommand(['/bin/bash', '-c', `echo a ${char} echo b`]); }).not.toThrow();
      }
    );

    it('should report the offending position', () => {
      try {
        assertSafeCommand(['sh;', '-c', 'true']);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(DangerousCharacterError);
        expect(error instanceof DangerousCharacterError && error.position).toBe(0);
      }
    });
  });

  describe('resolveContainer', () => {
    it('should derive the container name from the project', () => {
      expect(createSandbox().resolveContainer()).toBe('ddev-mysite-web');
    });

    it('should prefer an explicit container', () => {
      expect(createSandbox().resolveContainer('custom-db')).toBe('custom-db');
    });
  });

  describe('execute', () => {
    it('should verify ownership then run docker exec without a shell wrapper', async () => {
      mockExecuteFile.mockResolvedValueOnce(ok('mysite\n')).mockResolvedValueOnce(ok('hi\n'));

      const result = await createSandbox().execute(['/bin/bash', '-c', 'echo hi']);

      expect(result).toEqual(ok('hi\n'));
      expect(mockExecuteFile).toHaveBeenNthCalledWith(1, 'docker', [
        'inspect',
        '--format',
        LABEL_FORMAT,
        'ddev-mysite-web',
      ]);
      expect(mockExecuteFile).toHaveBeenNthCalledWith(
        2,
        'docker',
        ['exec', '-u', 'www-data', 'ddev-mysite-web', '/bin/bash', '-c', 'echo hi'],
        { maxBuffer: undefined }
      );
    });

    it('should run as the requested user in the requested container', async () => {
      mockExecuteFile.mockResolvedValueOnce(ok('mysite')).mockResolvedValueOnce(ok('0'));

      await createSandbox().execute(['id', '-u'], { container: 'ddev-mysite-db', user: 'root' });

      expect(mockExecuteFile).toHaveBeenLastCalledWith(
        'docker',
        ['exec', '-u', 'root', 'ddev-mysite-db', 'id', '-u'],
        { maxBuffer: undefined }
      );
    });

    it('should deny containers labelled for another project before executing', async () => {
      mockExecuteFile.mockResolvedValueOnce(ok('othersite\n'));

      await expect(createSandbox().execute(['/bin/bash', '-c', 'true'])).rejects.toThrow(PermissionDeniedError);
      expect(mockExecuteFile).toHaveBeenCalledTimes(1);
    });

    it('should describe the ownership mismatch', async () => {
      mockExecuteFile.mockResolvedValueOnce(ok('othersite\n'));

      await expect(createSandbox().execute(['ls'])).rejects.toThrow(
        "Container 'ddev-mysite-web' belongs to 'othersite', not 'mysite'"
      );
    });

    it('should deny containers without the site label', async () => {
      mockExecuteFile.mockResolvedValueOnce(ok('\n'));

      await expect(createSandbox().execute(['ls'])).rejects.toThrow(PermissionDeniedError);
    });

    it('should skip the label comparison for the default project', async () => {
      mockExecuteFile.mockResolvedValueOnce(ok('anything')).mockResolvedValueOnce(ok('done'));

      const result = await createSandbox('default-project').execute(['ls']);

      expect(result.stdout).toBe('done');
      expect(mockExecuteFile).toHaveBeenCalledTimes(2);
    });

    it('should proceed when the label lookup exits non-zero', async () => {
      mockExecuteFile
        .mockResolvedValueOnce({ stdout: '', stderr: 'Error: No such object: ddev-mysite-web', exitCode: 1 })
        .mockResolvedValueOnce(ok('done'));

      const result = await createSandbox().execute(['ls']);

      expect(result.stdout).toBe('done');
      expect(logger.warn).toHaveBeenCalledWith('Container validation failed, proceeding anyway', {
        container: 'ddev-mysite-web',
        stderr: 'Error: No such object: ddev-mysite-web',
      });
    });

    it('should proceed when the label lookup cannot run', async () => {
      mockExecuteFile
        .mockRejectedValueOnce(new ExecutionError('Failed to run docker: spawn docker ENOENT'))
        .mockResolvedValueOnce(ok('done'));

      const result = await createSandbox().execute(['ls']);

      expect(result.stdout).toBe('done');
      expect(logger.warn).toHaveBeenCalledWith('Container validation error (continuing)', {
        container: 'ddev-mysite-web',
        error: 'Failed to run docker: spawn docker ENOENT',
      });
    });

    it('should return non-zero exits without throwing', async () => {
      mockExecuteFile
        .mockResolvedValueOnce(ok('mysite'))
        .mockResolvedValueOnce({ stdout: '', stderr: 'not found', exitCode: 127 });

      const result = await createSandbox().execute(['/bin/bash', '-c', 'nope']);

      expect(result).toEqual({ stdout: '', stderr: 'not found', exitCode: 127 });
    });

    it('should propagate runtime failures as ExecutionError', async () => {
      mockExecuteFile
        .mockResolvedValueOnce(ok('mysite'))
        .mockRejectedValueOnce(new ExecutionError('Failed to run docker: spawn docker ENOENT'));

      await expect(createSandbox().execute(['ls'])).rejects.toThrow(ExecutionError);
    });

    it('should reject unsafe commands before touching docker', async () => {
      await expect(createSandbox().execute(['/bin/bash;rm', '-c', 'true'])).rejects.toThrow(DangerousCharacterError);
      await expect(createSandbox().execute([])).rejects.toThrow(InvalidCommandError);
      expect(mockExecuteFile).not.toHaveBeenCalled();
    });

    it('should log only the first three argv tokens', async () => {
      mockExecuteFile.mockResolvedValueOnce(ok('mysite')).mockResolvedValueOnce(ok(''));

      await createSandbox().execute(['/bin/bash', '-c', 'echo secret-payload', 'extra', 'more']);

      expect(logger.info).toHaveBeenCalledWith('EXEC', {
        container: 'ddev-mysite-web',
        user: 'www-data',
        command: '/bin/bash -c echo secret-payload',
      });
    });

    it('should re-check ownership on every call', async () => {
      mockExecuteFile.mockResolvedValue(ok('mysite'));
      const sandbox = createSandbox();

      await sandbox.execute(['ls']);
      await sandbox.execute(['ls']);

      const inspectCalls = mockExecuteFile.mock.calls.filter(([, args]) => args[0] === 'inspect');
      expect(inspectCalls).toHaveLength(2);
    });
  });
});
