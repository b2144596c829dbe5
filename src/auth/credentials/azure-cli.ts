/**
 * Azure CLI credential: reuses the session of a logged-in `az`.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { z } from 'zod';
import { AuthResolutionError, CredentialUnavailableError } from '../../errors/index.js';
import { scopeToResource } from './managed-identity.js';
import type { AccessToken, TokenCredential } from './types.js';

const execFileAsync = promisify(execFile);

/** Runs a command and resolves with its stdout */
export type CommandRunner = (command: string, args: string[]) => Promise<string>;

/**
 * `az account get-access-token` output. Recent CLI versions add `expires_on`
 * in epoch seconds; older ones only give a local `expiresOn` timestamp.
 */
const cliTokenSchema = z.object({
  accessToken: z.string().min(1),
  expiresOn: z.string().optional(),
  expires_on: z.coerce.number().positive().optional(),
});

const defaultRunner: CommandRunner = async (command, args) => {
  const { stdout } = await execFileAsync(command, args, { encoding: 'utf8', timeout: 10000 });
  return stdout;
};

function errorCode(error: unknown): unknown {
  return error instanceof Error && 'code' in error ? error.code : undefined;
}

/** Azure CLI options */
export interface AzureCliCredentialOptions {
  runner?: CommandRunner;
}

/**
 * Azure CLI credential
 */
export class AzureCliCredential implements TokenCredential {
  private readonly runner: CommandRunner;

  constructor(options: AzureCliCredentialOptions = {}) {
    this.runner = options.runner ?? defaultRunner;
  }

  async getToken(scope: string): Promise<AccessToken> {
    const args = ['account', 'get-access-token', '--resource', scopeToResource(scope), '--output', 'json'];

    let stdout: string;
    try {
      stdout = await this.runner('az', args);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (errorCode(error) === 'ENOENT' || /not recognized|command not found/.test(message)) {
        throw new CredentialUnavailableError({ message: 'Azure CLI not installed' });
      }
      if (message.includes('az login')) {
        throw new CredentialUnavailableError({ message: "Please run 'az login' to set up an account" });
      }
      throw new AuthResolutionError({
        message: `Azure CLI failed to provide a token: ${message}`,
        cause: error instanceof Error ? error : undefined,
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(stdout);
    } catch {
      throw new AuthResolutionError({ message: 'Azure CLI returned output that is not JSON' });
    }

    const parsed = cliTokenSchema.safeParse(json);
    if (!parsed.success) {
      throw new AuthResolutionError({ message: 'Azure CLI returned an unexpected token response' });
    }

    const { accessToken, expiresOn, expires_on } = parsed.data;
    const expiresOnTimestamp =
      expires_on !== undefined ? expires_on * 1000 : Date.parse((expiresOn ?? '').replace(' ', 'T'));
    if (Number.isNaN(expiresOnTimestamp)) {
      throw new AuthResolutionError({ message: 'Azure CLI token has no usable expiry' });
    }

    return { token: accessToken, expiresOnTimestamp };
  }
}
