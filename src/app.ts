import express, { type Request, type Response } from 'express';

import { resolveConverterConfig, type ConverterConfig } from './config/converter';
import { ensureStorageDirectories, resolveStoragePaths, type StoragePaths } from './config/storage';
import { createEventsRouter } from './routes/events';
import { createFavoritesRouter } from './routes/favorites';
import { createQueueRouter } from './routes/queue';
import { ConversionService } from './services/conversionService';
import { FavoritesStore } from './services/favoritesStore';
import { JobOrchestrator } from './services/jobOrchestrator';
import { OutputOrganizer } from './services/outputOrganizer';
import { UnpdfInspector, type PdfInspector } from './services/pdfInspector';
import { ProcessRunner, type ConverterRunner } from './services/processRunner';
import { RequestQueue } from './services/requestQueue';
import { SourceAcquisition } from './services/sourceAcquisition';

export interface AppOptions {
  storageRoot?: string;
  converter?: Partial<ConverterConfig>;
  runner?: ConverterRunner;
  inspector?: PdfInspector;
  fetchImpl?: typeof fetch;
}

export interface AppContext {
  app: express.Express;
  storage: StoragePaths;
  orchestrator: JobOrchestrator;
  conversionService: ConversionService;
  favorites: FavoritesStore;
  shutdown: () => Promise<void>;
}

export async function createApp(options: AppOptions = {}): Promise<AppContext> {
  const storage = resolveStoragePaths(options.storageRoot);
  await ensureStorageDirectories(storage);

  const favorites = new FavoritesStore(storage.favoritesFile);
  const loadedFavorites = await favorites.load();

  const converter: ConverterConfig = { ...resolveConverterConfig(), ...options.converter };
  const runner = options.runner ?? new ProcessRunner(converter);
  const acquisition = new SourceAcquisition({
    downloadDirectory: storage.downloadsDir,
    uploadDirectory: storage.uploadsDir,
    fetchImpl: options.fetchImpl
  });
  const orchestrator = new JobOrchestrator(new RequestQueue(), runner, new OutputOrganizer(), {
    workDirectory: storage.workDir,
    releaseSource: (request) => acquisition.release(request.source)
  });
  const conversionService = new ConversionService(orchestrator, {
    defaultOutputDirectory: storage.convertedDir,
    acquisition,
    favorites,
    inspector: options.inspector ?? new UnpdfInspector()
  });

  console.log(`Using storage directory: ${storage.root}`);
  console.log(`Using marker executable at: ${converter.executablePath}`);
  console.log(`Loaded ${loadedFavorites.length} favorite folder(s) from ${favorites.getFilePath()}`);

  const app = express();
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  app.use('/queue', createQueueRouter(orchestrator, conversionService, { uploadsDirectory: storage.uploadsDir }));
  app.use('/favorites', createFavoritesRouter(favorites));
  app.use('/events', createEventsRouter(orchestrator));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  const shutdown = async (): Promise<void> => {
    orchestrator.cancelAll();
    await orchestrator.whenIdle();
  };

  return { app, storage, orchestrator, conversionService, favorites, shutdown };
}
