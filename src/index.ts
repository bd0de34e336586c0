import fs from 'fs';
import { buildServer } from './api/server';
import { DATASET_PATH, HOST, LOG_LEVEL, PORT } from './config/server';
import { parseTemperatureCsv } from './utils/dataset';
import { DatasetStore } from './utils/store';

/**
 * Load DATASET_PATH into the store, if configured
 */
function preloadDataset(store: DatasetStore): void {
  if (!DATASET_PATH) return;

  const { readings, failed } = parseTemperatureCsv(fs.readFileSync(DATASET_PATH, 'utf8'));
  const record = store.add(readings);
  console.log(
    `Preloaded ${DATASET_PATH}: dataset ${record.id} (${readings.length} readings, ${failed.length} rejected, ${record.cities.length} cities)`
  );
}

// Start server
const start = async () => {
  const store = new DatasetStore();
  const app = buildServer({ store, logger: { level: LOG_LEVEL } });

  try {
    preloadDataset(store);

    await app.listen({ port: PORT, host: HOST });
    console.log(`ThermoWatch API running on http://localhost:${PORT}`);
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

void start();
