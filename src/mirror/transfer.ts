import * as exec from '@actions/exec';
import { Logger } from '../logger';
import { RegistryCredentials } from '../types';

/**
 * Moves image bytes with the Docker CLI.
 *
 * Each call runs one docker command; a non-zero exit rejects. Nothing here
 * talks to a registry API directly.
 */
export class DockerTransfer {
  private readonly logger: Logger;
  private readonly docker: string;

  constructor(logger: Logger, docker: string = 'docker') {
    this.logger = logger;
    this.docker = docker;
  }

  private async run(args: string[], options: exec.ExecOptions = {}): Promise<void> {
    this.logger.debug(`[Docker] ${this.docker} ${args.join(' ')}`);
    await exec.exec(this.docker, args, {
      silent: !this.logger.verbose,
      ...options,
    });
  }

  /**
   * Log in with the password on stdin so it never shows in the process list
   */
  async login(credentials: RegistryCredentials): Promise<void> {
    await this.run(
      ['login', credentials.registry, '--username', credentials.username, '--password-stdin'],
      { input: Buffer.from(credentials.password) }
    );
    this.logger.debug(`[Docker] Logged in to ${credentials.registry} as ${credentials.username}`);
  }

  async pull(reference: string): Promise<void> {
    await this.run(['pull', '--quiet', reference]);
  }

  async tag(source: string, target: string): Promise<void> {
    await this.run(['tag', source, target]);
  }

  async push(reference: string): Promise<void> {
    await this.run(['push', '--quiet', reference]);
  }

  /**
   * Pull one image by digest and push it under target
   */
  async transferImage(source: string, target: string): Promise<void> {
    await this.pull(source);
    await this.tag(source, target);
    await this.push(target);
  }

  /**
   * Assemble individually pushed images into a manifest list and push it
   */
  async publishManifestList(list: string, members: readonly string[]): Promise<void> {
    if (members.length === 0) {
      throw new Error(`Manifest list ${list} needs at least one image`);
    }
    await this.run(['manifest', 'create', list, ...members]);
    await this.run(['manifest', 'push', list]);
  }
}
