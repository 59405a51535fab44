import { config } from './config';
import { createApp, createDependencies } from './app';

const app = createApp(createDependencies(config));

const server = app.listen(config.port, () => {
  console.log(`🚀 NBA Player Analysis API server running on port ${config.port}`);
  console.log(`📊 Environment: ${config.nodeEnv}`);
  console.log(`💾 Response cache: ${config.cacheDriver}${config.cacheDriver === 'file' ? ` (${config.cacheDir})` : ''}`);
});

process.on('SIGTERM', () => {
  console.log('📴 SIGTERM received, shutting down gracefully');
  server.close(() => {
    console.log('✅ Process terminated');
  });
});

export default app;
