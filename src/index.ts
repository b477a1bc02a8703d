import 'dotenv/config';
import http from 'http';

import { createApp } from './app';

const port = Number(process.env.PORT ?? 3100);

async function bootstrap(): Promise<void> {
  try {
    const { app, shutdown } = await createApp();
    const server = http.createServer(app);

    server.listen(port, () => {
      // eslint-disable-next-line no-console
      console.log(`marker-desk listening on port ${port}`);
      const host = (process.env.HOST ?? 'localhost').trim() || 'localhost';
      // eslint-disable-next-line no-console
      console.log(`Open http://${host}:${port}/`);
    });

    let stopping = false;
    const stop = (signal: NodeJS.Signals): void => {
      if (stopping) {
        return;
      }
      stopping = true;
      // eslint-disable-next-line no-console
      console.log(`Received ${signal}, cancelling conversions...`);

      shutdown()
        .then(() => {
          server.close(() => process.exit(0));
          server.closeAllConnections();
        })
        .catch((error: unknown) => {
          const message = error instanceof Error ? error.message : 'Unknown shutdown error';
          // eslint-disable-next-line no-console
          console.error('Failed to shut down cleanly:', message);
          process.exit(1);
        });
    };

    process.on('SIGINT', stop);
    process.on('SIGTERM', stop);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown startup error';
    // eslint-disable-next-line no-console
    console.error('Failed to start server:', message);
    process.exit(1);
  }
}

void bootstrap();
