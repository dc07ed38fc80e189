import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { ExecutionTimeout } from '../../errors/index.js';
import { logger } from '../../utils/logger.js';
import { maskConnectionString, maskConnectionStrings } from '../../utils/mask.js';
import { ExecuteOptions, ExecutionOutput, ICommandExecutor } from '../interfaces.js';
import { ProcessLauncher, spawnProcess } from './process.js';

export class ShellExecutor implements ICommandExecutor {
  constructor(
    private readonly uri: string,
    private readonly client: string = 'mongosh',
    private readonly launch: ProcessLauncher = spawnProcess
  ) {}

  get target(): string {
    return maskConnectionString(this.uri);
  }

  /**
   * Writes the script to a private temp directory, runs `<client> <uri> --quiet --file <script>`
   * once, and removes the directory whatever the outcome.
   */
  async run(script: string, { timeoutSeconds }: ExecuteOptions): Promise<ExecutionOutput> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'docshift-'));
    const file = path.join(dir, 'script.js');

    try {
      await fs.writeFile(file, script, 'utf-8');

      const start = Date.now();
      const outcome = await this.launch(this.client, [this.uri, '--quiet', '--file', file], timeoutSeconds * 1000);
      const duration = Date.now() - start;

      if (outcome.timedOut) {
        logger.warn({ target: this.target, duration }, 'Client script timed out');
        throw new ExecutionTimeout(timeoutSeconds);
      }

      logger.debug({ target: this.target, duration, exitCode: outcome.exitCode }, 'Executed client script');
      return {
        exitCode: outcome.exitCode,
        stdout: outcome.stdout,
        stderr: maskConnectionStrings(outcome.stderr),
      };
    } finally {
      await fs.remove(dir);
    }
  }
}
