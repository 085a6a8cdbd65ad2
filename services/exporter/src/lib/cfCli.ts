import type { CommandRunner } from './commandRunner.js';

export interface CfCliOptions {
  binary: string;
  timeoutMs: number;
  /** Base environment for every cf invocation (PATH, HOME or CF_HOME). */
  env: NodeJS.ProcessEnv;
}

/**
 * Thin wrapper over the Cloud Foundry CLI.
 *
 * Credentials are only ever handed to `cf auth` through its environment,
 * never as arguments, and are stripped from every other invocation.
 */
export class CfCli {
  constructor(
    private readonly runner: CommandRunner,
    private readonly options: CfCliOptions
  ) {}

  async setApi(endpoint: string): Promise<void> {
    await this.exec(['api', endpoint]);
  }

  async auth(username: string, password: string): Promise<void> {
    await this.exec(['auth'], { CF_USERNAME: username, CF_PASSWORD: password });
  }

  /**
   * Issue an authenticated GET against the Cloud Controller and return the
   * raw response body.
   */
  async curl(path: string): Promise<string> {
    const { stdout } = await this.exec(['curl', path]);
    return stdout;
  }

  private exec(args: string[], extraEnv: NodeJS.ProcessEnv = {}) {
    const { CF_USERNAME: _username, CF_PASSWORD: _password, ...baseEnv } = this.options.env;

    return this.runner.run(this.options.binary, args, {
      env: { ...baseEnv, CF_COLOR: 'false', ...extraEnv },
      timeoutMs: this.options.timeoutMs,
    });
  }
}
