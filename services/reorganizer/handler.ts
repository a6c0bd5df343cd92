import type { StorageGateway } from "../../libs/gateways/storage";
import type { Metrics } from "../../libs/obs/metrics";
import { errorMessage, type Logger } from "../../libs/obs/logger";
import { destinationKey, extractIdentifier, isRootLevel } from "../../libs/keys/object-keys";

export type ReorganizeDeps = { storage: StorageGateway; log: Logger; metrics: Metrics };

export type ReorganizeOptions = {
    bucket: string;
    /** Slash terminated. */
    prefixDir: string;
    identifierSeparator: string;
};

/** identifier -> original keys moved this run, in move order */
export type MovedFiles = Map<string, string[]>;

export type ReorganizeResult = {
    moved: MovedFiles;
    duplicatesRemoved: string[];
    skipped: string[];
    failures: Array<{ key: string; error: string }>;
};

/**
 * Files every root-level object under `<prefix><identifier>/<key>`.
 *
 * When the destination already holds an object with that key the root copy is
 * deleted and the identifier is not counted as moved, so a re-dropped file never
 * produces a second copy or a second notification. Per-object errors are logged
 * and the object stays at the root for the next run; a failure to list the
 * bucket propagates. A copy whose original could not be deleted still counts as
 * moved; the next run removes the leftover as a duplicate.
 */
export async function moveAndCleanObjects(deps: ReorganizeDeps, opts: ReorganizeOptions): Promise<ReorganizeResult> {
    const { storage, log, metrics } = deps;
    const result: ReorganizeResult = { moved: new Map(), duplicatesRemoved: [], skipped: [], failures: [] };

    const keys = await storage.listObjects(opts.bucket);
    // folder markers ("archive/") contain a slash, so they are never root level
    const roots = keys.filter(isRootLevel);
    log.info(`Found ${roots.length} root-level object(s) in ${opts.bucket}.`);

    for (const key of roots) {
        const identifier = extractIdentifier(key, opts.identifierSeparator);
        if (!identifier) {
            log.warn(`No identifier in '${key}' (expected '<id>${opts.identifierSeparator}...'), leaving it in place.`);
            result.skipped.push(key);
            continue;
        }

        const target = destinationKey(opts.prefixDir, identifier, key);
        try {
            if (await storage.objectExists(opts.bucket, target)) {
                await storage.deleteObject(opts.bucket, key);
                log.info(`Deleted original file '${key}' as it already exists at '${target}'.`);
                result.duplicatesRemoved.push(key);
                continue;
            }

            await storage.copyObject(opts.bucket, key, target);
            // the new copy counts even if removing the original fails below
            const files = result.moved.get(identifier) ?? [];
            files.push(key);
            result.moved.set(identifier, files);

            await storage.deleteObject(opts.bucket, key);
            log.info(`Successfully moved ${key} to ${target}.`);
        } catch (err) {
            const error = errorMessage(err);
            log.error(`Failed to move '${key}' to '${target}': ${error}`);
            result.failures.push({ key, error });
        }
    }

    if (!result.moved.size && !result.duplicatesRemoved.length) log.info("No files found to move or delete.");

    const moves = [...result.moved.values()].reduce((n, files) => n + files.length, 0);
    await metrics.metricCount("files_moved_count", moves, { service: "reorganizer" });
    await metrics.metricCount("duplicates_removed_count", result.duplicatesRemoved.length, { service: "reorganizer" });
    if (result.failures.length) {
        await metrics.metricCount("move_error_count", result.failures.length, { service: "reorganizer" });
    }
    return result;
}
