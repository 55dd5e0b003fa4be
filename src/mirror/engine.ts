import {
  DigestEntry,
  ImageFailure,
  ImageRef,
  MirrorConfig,
  ProtocolError,
  RegistryCredentials,
  RegistryError,
  ResolvedManifest,
  SyncPlan,
  SyncResult,
  UpdateResult,
} from '../types';
import { Logger } from '../logger';
import { ManifestResolver } from '../registry/resolver';
import { mapWithConcurrency } from '../utils/concurrency';
import { destinationRef, formatImageRef } from '../utils/validation';
import { missingDigests, sameDigests } from './filters';
import { DockerTransfer } from './transfer';
import { errorMessage } from '../utils/errors';

type Outcome<T> = { ok: true; value: T } | { ok: false; failure: ImageFailure };

/**
 * Runs the update and sync commands over an inventory.
 * A failing image is recorded and the remaining images are still processed.
 */
export class MirrorEngine {
  private readonly resolver: ManifestResolver;
  private readonly transfer: DockerTransfer;
  private readonly config: MirrorConfig;
  private readonly logger: Logger;

  constructor(resolver: ManifestResolver, transfer: DockerTransfer, config: MirrorConfig, logger: Logger) {
    this.resolver = resolver;
    this.transfer = transfer;
    this.config = config;
    this.logger = logger;
  }

  /**
   * Re-resolve every image. Images that fail keep their previous digests.
   */
  async update(images: readonly ResolvedManifest[]): Promise<UpdateResult> {
    const result: UpdateResult = { images: [], updatedImages: [], errors: [] };

    const outcomes = await this.forEachImage(images, async (image) => {
      this.logger.info(`updating ${formatImageRef(image)}...`);
      return this.resolver.resolve(image);
    });

    outcomes.forEach((outcome, index) => {
      const previous = images[index];
      if (!outcome.ok) {
        result.errors.push(outcome.failure);
        result.images.push(previous);
        return;
      }

      const resolved = outcome.value;
      if (resolved.digests.length === 0) {
        this.logger.warning(
          `${formatImageRef(previous)} has no digests for ${this.config.architectures.join(', ')}`
        );
      }
      if (!sameDigests(previous.digests, resolved.digests)) {
        result.updatedImages.push(formatImageRef(resolved));
        this.logger.verboseInfo(
          `  ${formatImageRef(resolved)}: ${describeDigests(previous.digests)} -> ${describeDigests(resolved.digests)}`
        );
      }
      result.images.push(resolved);
    });

    this.logger.info(
      `Update complete: ${result.updatedImages.length} changed, ${result.errors.length} failed, ${images.length} total`
    );
    return result;
  }

  /**
   * Push every image whose destination is missing one of its digests
   */
  async sync(images: readonly ResolvedManifest[], credentials?: RegistryCredentials): Promise<SyncResult> {
    const result: SyncResult = { syncedImages: [], upToDateImages: [], errors: [] };

    if (credentials && !this.config.dryRun) {
      this.logger.info(`Logging in to ${credentials.registry}...`);
      await this.transfer.login(credentials);
    }

    const outcomes = await this.forEachImage(images, async (image) => {
      const plan = await this.planSync(image);
      if (plan.missingDigests.length === 0) {
        this.logger.verboseInfo(`${formatImageRef(image)} is up to date`);
        return false;
      }

      if (this.config.dryRun) {
        this.logger.info(`would sync ${formatImageRef(image)}...`);
        this.logger.verboseInfo(`  missing: ${plan.missingDigests.join(', ')}`);
        return true;
      }

      this.logger.info(`syncing ${formatImageRef(image)}...`);
      await this.executeSync(plan);
      return true;
    });

    outcomes.forEach((outcome, index) => {
      const name = formatImageRef(images[index]);
      if (!outcome.ok) {
        result.errors.push(outcome.failure);
      } else if (outcome.value) {
        result.syncedImages.push(name);
      } else {
        result.upToDateImages.push(name);
      }
    });

    const verb = this.config.dryRun ? 'would sync' : 'synced';
    this.logger.info(
      `Sync complete: ${result.syncedImages.length} ${verb}, ${result.upToDateImages.length} up to date, ${result.errors.length} failed`
    );
    return result;
  }

  /**
   * Compare the inventory digests with what the destination tag holds now
   */
  async planSync(image: ResolvedManifest): Promise<SyncPlan> {
    const destination = destinationRef(image, this.config.destinationRegistry, this.config.destinationPrefix);
    const existing = await this.destinationDigests(destination);
    this.logger.debug(
      `[Engine] ${formatImageRef(destination)} holds ${existing.length} digests, inventory has ${image.digests.length}`
    );

    return {
      source: image,
      destination,
      missingDigests: missingDigests(image.digests, existing),
    };
  }

  /**
   * Push each inventory digest as `{tag}-digest{i}`, then the list at `{tag}`
   */
  async executeSync(plan: SyncPlan): Promise<void> {
    const list = formatImageRef(plan.destination);
    const members: string[] = [];

    for (const [index, entry] of plan.source.digests.entries()) {
      const source = `${plan.source.registry}/${plan.source.repository}@${entry.digest}`;
      const target = `${list}-digest${index}`;
      this.logger.debug(`[Engine] ${source} -> ${target}`);
      await this.transfer.transferImage(source, target);
      members.push(target);
    }

    await this.transfer.publishManifestList(list, members);
  }

  /**
   * A tolerated status from the token, manifest or blob fetch means the
   * destination holds nothing for the tag yet
   */
  private async destinationDigests(destination: ImageRef): Promise<DigestEntry[]> {
    try {
      return await this.resolver.resolveAll(destination);
    } catch (error) {
      if (
        error instanceof RegistryError &&
        !(error instanceof ProtocolError) &&
        error.statusCode !== undefined &&
        this.config.toleratedStatuses.includes(error.statusCode)
      ) {
        this.logger.debug(
          `[Engine] ${formatImageRef(destination)} returned ${error.statusCode}, treating as empty`
        );
        return [];
      }
      throw error;
    }
  }

  private async forEachImage<T>(
    images: readonly ResolvedManifest[],
    fn: (image: ResolvedManifest) => Promise<T>
  ): Promise<Outcome<T>[]> {
    return mapWithConcurrency(images, this.config.concurrency, async (image): Promise<Outcome<T>> => {
      try {
        return { ok: true, value: await fn(image) };
      } catch (error) {
        const message = errorMessage(error);
        this.logger.imageFailed(formatImageRef(image), message);
        return { ok: false, failure: { image: formatImageRef(image), error: message } };
      }
    });
  }
}

function describeDigests(digests: readonly DigestEntry[]): string {
  if (digests.length === 0) {
    return '(none)';
  }
  return digests.map((entry) => `${entry.architecture}=${entry.digest}`).join(', ');
}

