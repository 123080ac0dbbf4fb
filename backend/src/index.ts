import { createApp } from './app';
import { AppConfig, loadConfig } from './config';
import { VehicleStore } from './types';
import { NormalizationTable } from './utils/normalization';
import { OpenAiSearchModels } from './utils/openaiService';
import { QdrantVehicleStore } from './utils/qdrantStore';
import { ingestVehicles, readInventoryFile } from './utils/vehicleProcessor';
import { InMemoryVehicleStore } from './utils/vectorStore';

async function createStore(
  config: AppConfig,
  models: OpenAiSearchModels,
  normalization: NormalizationTable
): Promise<VehicleStore> {
  if (config.vectorStore === 'qdrant') {
    return new QdrantVehicleStore(config.qdrant);
  }

  const store = new InMemoryVehicleStore();
  if (config.inventoryFile) {
    const items = await readInventoryFile(config.inventoryFile);
    await ingestVehicles(items, { store, normalization, embedMany: texts => models.embedMany(texts) });
  } else {
    console.warn('Using the in-memory vehicle store without INVENTORY_FILE; every search will return no results');
  }
  return store;
}

async function main(): Promise<void> {
  const config = loadConfig();
  const models = new OpenAiSearchModels(config.openai);
  const normalization = NormalizationTable.fromFile(config.normalizationTablePath);
  const store = await createStore(config, models, normalization);

  const app = createApp({ models, store, normalization }, config.pipeline, { corsOrigins: config.corsOrigins });

  app.listen(config.port, '0.0.0.0', () => {
    console.log(`Server is running on port ${config.port}`);
    console.log(`Vector store: ${config.vectorStore}, chat model: ${config.openai.chatModel}`);
    console.log(`Health check: http://localhost:${config.port}/api/health`);
  });
}

main().catch(error => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
