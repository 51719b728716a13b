import { loadSettingsFromEnvironment } from './config/settings';
import { createApp } from './app';
import { DocumentCatalog } from './services/DocumentCatalog';
import { DocumentQAService } from './services/DocumentQAService';
import { EmbeddingService, createGeminiEmbeddingClient } from './services/EmbeddingService';
import { DocumentArchive, GCStorageService } from './services/GCStorageService';
import { InMemoryDocumentCatalog } from './services/InMemoryDocumentCatalog';
import { InMemoryVectorIndex } from './services/InMemoryVectorIndex';
import { GeminiLanguageModel } from './services/LanguageModel';
import { MongoDocumentCatalog } from './services/MongoDocumentCatalog';
import { PineconeVectorIndex } from './services/PineconeVectorIndex';
import { VectorIndex } from './services/VectorIndex';

const settings = loadSettingsFromEnvironment();

let catalog: DocumentCatalog;
if (settings.mongodbUri) {
  catalog = new MongoDocumentCatalog(settings.mongodbUri, settings.mongodbDbName);
} else {
  console.warn('[Server] WARNING: MONGODB_URI is not set, using the in-memory document catalog');
  catalog = new InMemoryDocumentCatalog();
}

let vectorIndex: VectorIndex;
if (settings.pineconeApiKey) {
  vectorIndex = new PineconeVectorIndex(settings.pineconeApiKey, settings.pineconeIndexName, settings.embeddingDimension);
} else {
  console.warn('[Server] WARNING: PINECONE_API_KEY is not set, using the in-memory vector index');
  vectorIndex = new InMemoryVectorIndex();
}

let archive: DocumentArchive | null = null;
if (settings.gcsBucket) {
  try {
    archive = new GCStorageService(settings.gcsBucket, settings.googleCloudProjectId);
  } catch (error) {
    console.error('[Server] GCS service initialization failed:', error);
  }
}

let qaService: DocumentQAService | null = null;
if (settings.geminiApiKey) {
  const embedder = new EmbeddingService(
    createGeminiEmbeddingClient(settings.geminiApiKey, settings.embeddingModel),
    {
      model: settings.embeddingModel,
      dimension: settings.embeddingDimension,
      retryPolicy: settings.retryPolicy,
      timeoutMs: settings.embeddingTimeoutMs,
      maxConcurrent: settings.embeddingMaxConcurrent
    }
  );
  const llm = new GeminiLanguageModel(settings.geminiApiKey, settings.llmModel, settings.llmTemperature);

  qaService = new DocumentQAService(
    { catalog, vectorIndex, embedder, llm, archive },
    {
      chunkSize: settings.chunkSize,
      chunkOverlap: settings.chunkOverlap,
      retrievalTopK: settings.retrievalTopK,
      contextCharBudget: settings.contextCharBudget,
      maxFileSize: settings.maxFileSize,
      allowedFormats: settings.allowedFormats,
      rateLimitPerMinute: settings.rateLimitPerMinute,
      workerConcurrency: settings.workerConcurrency,
      llmTimeoutMs: settings.llmTimeoutMs,
      extractionTimeoutMs: settings.extractionTimeoutMs,
      retryPolicy: settings.retryPolicy
    }
  );
} else {
  console.error('[Server] WARNING: GEMINI_API_KEY environment variable is not set');
}

// Connect asynchronously so the health endpoint comes up even while the database is unreachable
catalog.connect().catch(err => {
  console.error('[Server] Database connection failed:', err);
});

const app = createApp({ qaService, maxFileSize: settings.maxFileSize, corsOrigins: settings.corsOrigins });

const server = app.listen(settings.port, () => {
  console.log(`[Server] Server started on port ${settings.port}`);
  console.log(`[Server] Health check available at http://localhost:${settings.port}/health`);
});

function shutdown(signal: string): void {
  console.log(`[Server] ${signal} received, shutting down`);
  server.close(() => {
    catalog.disconnect()
      .catch(err => {
        console.error('[Server] Database disconnect failed:', err);
      })
      .finally(() => process.exit(0));
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
