import * as core from '@actions/core';
import { getInputs, ParsedInputs } from './config';
import { HttpClient } from './utils/api';
import { ChallengeCache } from './registry/challenge';
import { ManifestResolver } from './registry/resolver';
import { MirrorEngine } from './mirror/engine';
import { DockerTransfer } from './mirror/transfer';
import { loadInventory, renderInventory, saveInventory } from './mirror/inventory';
import { ImageFailure, Inventory } from './types';
import { errorMessage } from './utils/errors';

async function runUpdate(engine: MirrorEngine, inventory: Inventory, inputs: ParsedInputs): Promise<ImageFailure[]> {
  const { logger, inventoryPath, mirrorConfig } = inputs;
  const result = await logger.group('Resolving digests', () => engine.update(inventory.images));

  if (mirrorConfig.dryRun) {
    logger.info(`DRY RUN: ${inventoryPath} would be written as:`);
    logger.info(renderInventory(result.images));
  } else {
    await saveInventory(inventoryPath, result.images);
    logger.info(`Wrote ${result.images.length} images to ${inventoryPath}`);
  }

  core.setOutput('updated-count', result.updatedImages.length);
  core.setOutput('updated-images', result.updatedImages.join(','));
  return result.errors;
}

async function runSync(engine: MirrorEngine, inventory: Inventory, inputs: ParsedInputs): Promise<ImageFailure[]> {
  const result = await inputs.logger.group('Syncing images', () =>
    engine.sync(inventory.images, inputs.credentials)
  );

  core.setOutput('synced-count', result.syncedImages.length);
  core.setOutput('synced-images', result.syncedImages.join(','));
  return result.errors;
}

/**
 * Main entry point for the action
 */
export async function run(): Promise<void> {
  try {
    const inputs = getInputs();
    const { command, inventoryPath, mirrorConfig, logger } = inputs;

    const inventory = await loadInventory(inventoryPath);
    logger.info(`Loaded ${inventory.images.length} images from ${inventoryPath}`);

    // one challenge cache per run: each registry host is probed once
    const httpClient = new HttpClient(logger, { timeout: inputs.requestTimeout });
    const challenges = new ChallengeCache(logger, httpClient, inputs.probeTimeout);
    const resolver = new ManifestResolver(logger, httpClient, challenges, mirrorConfig.architectures);
    const engine = new MirrorEngine(resolver, new DockerTransfer(logger), mirrorConfig, logger);

    const errors =
      command === 'update'
        ? await runUpdate(engine, inventory, inputs)
        : await runSync(engine, inventory, inputs);

    core.setOutput('failed-count', errors.length);

    if (errors.length > 0) {
      logger.failureSummary(errors);
      core.setFailed(`${command} failed for ${errors.length} of ${inventory.images.length} images`);
    }
  } catch (error) {
    core.setFailed(errorMessage(error));
  }
}
