import type { Application } from 'express';
import {
  FileUnsupportedClaimSink,
  MemoryUnsupportedClaimSink,
  type UnsupportedClaimSink,
} from '@core/unsupported-log';
import type { DatasetCatalog } from '@core/catalog';
import type { UNSUPPORTED_LOG_SINKS } from '@shared/constants';
import { config } from './config';

export interface AppServices {
  catalog: DatasetCatalog;
  createSink: () => UnsupportedClaimSink;
  fallbackTimeoutMs: number;
  analysisConcurrency: number;
}

export interface SinkSettings {
  sink: (typeof UNSUPPORTED_LOG_SINKS)[number];
  directory: string;
}

export async function createSinkFactory(
  settings: SinkSettings = config.unsupportedLog,
): Promise<() => UnsupportedClaimSink> {
  switch (settings.sink) {
    case 'database': {
      // Loaded lazily so file-backed deployments never open a pool.
      const [{ db }, { DatabaseUnsupportedClaimSink }] = await Promise.all([
        import('@db/connection'),
        import('@db/unsupported-sink'),
      ]);
      const sink = new DatabaseUnsupportedClaimSink(db);
      return () => sink;
    }
    case 'memory':
      // Fresh per run: a shared sink would keep every batch for the life of the process.
      return () => new MemoryUnsupportedClaimSink();
    case 'file': {
      const sink = new FileUnsupportedClaimSink(settings.directory);
      return () => sink;
    }
  }
}

export function getServices(app: Application): AppServices {
  return app.locals.services as AppServices;
}
