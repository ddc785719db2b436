import 'dotenv/config';
import { createApp } from './app.js';
import { VERSION } from './version.js';

const { app, context } = createApp();
const { port, host } = context.config.api;

const server = app.listen(port, host, () => {
  console.log(`[phishlens] v${VERSION} listening on http://${host}:${port}`);
  console.log(`[phishlens] model ${context.analyzer.modelVersion}, lexicon ${context.analyzer.lexicon.version}, locale ${context.config.locale}`);
});

server.on('error', (err: NodeJS.ErrnoException) => {
  if (err.code === 'EADDRINUSE') {
    console.error(`Port ${port} is already in use`);
  } else {
    console.error('Failed to start server:', err);
  }
  process.exit(1);
});

// Graceful shutdown
let shuttingDown = false;
function shutdown(): void {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log('\nShutting down...');
  server.close(() => process.exit(0));
  // Force exit after 5 seconds
  setTimeout(() => process.exit(1), 5000).unref();
}

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
