import * as core from '@actions/core';
import { MirrorCommand, MirrorConfig, RegistryCredentials } from './types';
import {
  MAX_TIMEOUT_MS,
  normalizeRegistryHost,
  parseArchitectures,
  parsePositiveInteger,
  parseStatusList,
  validateCommand,
  validateMirrorConfig,
} from './utils/validation';
import { DEFAULT_INVENTORY_PATH } from './mirror/inventory';
import { DEFAULT_PROBE_TIMEOUT } from './registry/challenge';
import { Logger } from './logger';

export const DEFAULT_REQUEST_TIMEOUT = 60000;

export type ParsedInputs = {
  command: MirrorCommand;
  inventoryPath: string;
  mirrorConfig: MirrorConfig;
  probeTimeout: number;
  requestTimeout: number;
  credentials?: RegistryCredentials;
  logger: Logger;
};

function parseBoolean(val?: string): boolean {
  return val?.toLowerCase() === 'true' || val === '1';
}

function getBooleanInput(name: string): boolean {
  return core.getInput(name) ? core.getBooleanInput(name) : false;
}

export function getInputs(): ParsedInputs {
  const command = validateCommand(core.getInput('command', { required: true }).trim());
  const inventoryPath = core.getInput('inventory') || DEFAULT_INVENTORY_PATH;
  const dryRun = getBooleanInput('dry-run');
  const architectures = parseArchitectures(core.getInput('architectures') || 'amd64,arm64');
  const destinationRegistry = normalizeRegistryHost(core.getInput('destination-registry') || 'ghcr.io');

  const owner = process.env.GITHUB_REPOSITORY_OWNER?.toLowerCase();
  const destinationPrefix =
    core.getInput('destination-prefix') || (owner ? `${owner}/image-mirror-` : '');

  const toleratedStatuses = parseStatusList(core.getInput('tolerated-statuses') || '403,404');
  const probeTimeout = parsePositiveInteger(
    'probe-timeout',
    core.getInput('probe-timeout'),
    DEFAULT_PROBE_TIMEOUT,
    MAX_TIMEOUT_MS
  );
  const requestTimeout = parsePositiveInteger(
    'request-timeout',
    core.getInput('request-timeout'),
    DEFAULT_REQUEST_TIMEOUT,
    MAX_TIMEOUT_MS
  );
  const concurrency = parsePositiveInteger('concurrency', core.getInput('concurrency'), 1);
  const username = core.getInput('registry-username');
  const password = core.getInput('registry-password');
  const verboseInput = getBooleanInput('verbose');

  if (password) {
    core.setSecret(password);
  }
  if (username && !password) {
    throw new Error('registry-password is required when registry-username is provided');
  }

  const debugMode =
    (typeof core.isDebug === 'function' && core.isDebug()) ||
    parseBoolean(process.env.ACTIONS_STEP_DEBUG) ||
    parseBoolean(process.env.ACTIONS_RUNNER_DEBUG) ||
    parseBoolean(process.env.RUNNER_DEBUG);

  const verbose = verboseInput || debugMode;

  const logger = new Logger(verbose, debugMode);

  const mirrorConfig: MirrorConfig = {
    dryRun,
    architectures,
    destinationRegistry,
    destinationPrefix,
    toleratedStatuses,
    concurrency,
    verbose,
  };

  validateMirrorConfig(command, mirrorConfig);

  return {
    command,
    inventoryPath,
    mirrorConfig,
    probeTimeout,
    requestTimeout,
    credentials:
      username && password ? { registry: destinationRegistry, username, password } : undefined,
    logger,
  };
}
