import http from 'http';
import { createApp } from './app';
import { env } from './config/env';
import { ensureDataDir, resolveUserDictPaths } from './config/paths';
import { startupLogger } from './logger';
import { activeDictionary, getUserDictService } from './services/user-dict.service';

const PORT = env.PORT;

// 关闭超时时间（毫秒）
const SHUTDOWN_TIMEOUT = 10000;

let httpServer: http.Server | null = null;

async function startServer() {
  try {
    const paths = resolveUserDictPaths(env);
    await ensureDataDir(paths);
    startupLogger.info({ dataDir: paths.dataDir, resourceDir: paths.resourceDir }, 'Data directories ready');

    const userDictService = getUserDictService();
    const outcome = await userDictService.initialize();
    startupLogger.info({ outcome, activeDictionary: activeDictionary.current() }, 'User dictionary initialized');

    const app = createApp({ userDictService, activeDictionary });
    httpServer = app.listen(PORT, () => {
      startupLogger.info({ port: PORT, env: env.NODE_ENV }, 'Server running');
    });
  } catch (error) {
    startupLogger.error({ err: error }, 'Server startup failed');
    process.exit(1);
  }
}

async function gracefulShutdown(signal: string, exitCode: number = 0) {
  startupLogger.info({ signal, exitCode }, 'Received signal, shutting down gracefully');

  const shutdownTimeout = setTimeout(() => {
    startupLogger.error({ timeout: SHUTDOWN_TIMEOUT }, 'Graceful shutdown timed out, forcing exit');
    process.exit(exitCode || 1);
  }, SHUTDOWN_TIMEOUT);

  shutdownTimeout.unref();

  const server = httpServer;
  if (server) {
    await new Promise<void>((resolve) => {
      server.close((err) => {
        if (err) {
          startupLogger.error({ err }, 'Error closing HTTP server');
        } else {
          startupLogger.info('HTTP server closed successfully');
        }
        resolve();
      });
      server.closeIdleConnections();
    });
  }

  process.exit(exitCode);
}

process.on('SIGTERM', () => {
  void gracefulShutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void gracefulShutdown('SIGINT');
});

void startServer();
