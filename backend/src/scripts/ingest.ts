import path from 'path';
import { loadConfig } from '../config';
import { NormalizationTable } from '../utils/normalization';
import { OpenAiSearchModels } from '../utils/openaiService';
import { QdrantVehicleStore } from '../utils/qdrantStore';
import { ingestVehicles, readInventoryFile } from '../utils/vehicleProcessor';

// Usage: npm run ingest -- <inventory.json>
async function main(): Promise<void> {
  const config = loadConfig();
  const fileArg = process.argv[2] ?? config.inventoryFile;
  if (!fileArg) {
    throw new Error('Pass the inventory JSON file as the first argument or set INVENTORY_FILE');
  }
  if (config.vectorStore !== 'qdrant') {
    throw new Error('Ingestion writes to Qdrant; set VECTOR_STORE=qdrant (the in-memory store loads INVENTORY_FILE at start-up)');
  }

  const normalization = NormalizationTable.fromFile(config.normalizationTablePath);
  const models = new OpenAiSearchModels(config.openai);
  const store = new QdrantVehicleStore(config.qdrant);

  await store.ensureCollection(config.vectorSize);
  const items = await readInventoryFile(path.resolve(fileArg));
  const summary = await ingestVehicles(items, {
    store,
    normalization,
    embedMany: texts => models.embedMany(texts),
  });

  console.log(`Ingestion completed: ${summary.ingested} stored, ${summary.skipped} skipped`);
  console.log(`Collection '${config.qdrant.collection}' now holds ${await store.count()} vehicles`);
}

main().catch(error => {
  console.error('Ingestion failed:', error);
  process.exit(1);
});
