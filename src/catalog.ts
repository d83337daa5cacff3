/**
 * Wires the catalog's components over one database connection.
 */

import { CatalogService } from "./catalog-service.js";
import { type CatalogDatabase, openCatalogDatabase } from "./database.js";
import { LocationCache } from "./location-cache.js";
import { type Logger, silentLogger } from "./logger.js";
import { DirectoryRecordingStore } from "./recording-store.js";
import { SearchIndex } from "./search-index.js";
import { SyncCoordinator } from "./sync-coordinator.js";

/** Inputs to {@link createCatalog}. */
export interface CatalogOptions {
	/** Directory holding the timestamp directories. */
	recordingsDir: string;
	/** SQLite file, or ":memory:". */
	databasePath: string;
	logger?: Logger;
}

/** Every component of an open catalog. */
export interface Catalog {
	readonly db: CatalogDatabase;
	readonly store: DirectoryRecordingStore;
	readonly cache: LocationCache;
	readonly index: SearchIndex;
	readonly sync: SyncCoordinator;
	readonly service: CatalogService;
	/** Close the database. Waits for a running sync to settle first. */
	close(): Promise<void>;
}

/**
 * Open the database and build the component graph. The store writes
 * recording locations through to the cache as it loads them.
 *
 * @param options - Paths and logger
 * @returns The catalog
 */
export function createCatalog(options: CatalogOptions): Catalog {
	const logger = options.logger ?? silentLogger;
	const db = openCatalogDatabase(options.databasePath);

	const cache = new LocationCache(db, logger);
	const index = new SearchIndex(db, logger);
	const store = new DirectoryRecordingStore(options.recordingsDir, {
		locationCache: cache,
		logger,
	});
	const sync = new SyncCoordinator(store, index, logger);
	const service = new CatalogService(store, cache, index, logger);

	let closed = false;

	return {
		db,
		store,
		cache,
		index,
		sync,
		service,
		async close() {
			if (closed) return;
			closed = true;
			await sync.whenIdle();
			db.close();
		},
	};
}
