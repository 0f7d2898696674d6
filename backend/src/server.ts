import { createServer } from 'http';
import { Server } from 'socket.io';
import { createApp } from './app';
import { connectDatabase, disconnectDatabase } from './config/database';
import { connectRedis, disconnectRedis, RedisClient } from './config/redis';
import { groqConfig, serverConfig, sessionConfig } from './config/services';
import { PerformanceController } from './controllers/performanceController';
import { SessionController } from './controllers/sessionController';
import { MongoInterviewRecordRepository } from './repositories/interviewRecordRepository';
import { InterviewerAgent } from './services/ai/interviewerAgent';
import { GroqTextGenerator } from './services/ai/textGenerator';
import { EvaluationService } from './services/evaluation/evaluationService';
import { FallbackProvider } from './services/fallback/fallbackProvider';
import { PerformanceService } from './services/performance/performanceService';
import { SessionLock } from './services/session/sessionLock';
import { KeyValueClient, MemoryKeyValueClient, redisKeyValueClient, SessionStore } from './services/session/sessionStore';
import { registerInterviewSocket } from './socket/interviewSocket';

const startServer = async () => {
  let redisClient: RedisClient | null = null;

  try {
    // Connect to MongoDB
    await connectDatabase();
    console.log('✓ MongoDB connected');

    // Redis holds live session state; without it sessions live in this process only
    let keyValueClient: KeyValueClient;
    try {
      redisClient = await connectRedis();
      keyValueClient = redisKeyValueClient(redisClient);
      console.log('✓ Redis connected');
    } catch (error) {
      console.warn('⚠️ Redis unavailable, keeping session state in memory:', error);
      keyValueClient = new MemoryKeyValueClient();
    }

    const fallbacks = new FallbackProvider();
    const generator = new GroqTextGenerator(groqConfig);
    const store = new SessionStore(keyValueClient, sessionConfig.ttlSeconds, sessionConfig.storedHistoryLimit);
    const agent = new InterviewerAgent({
      store,
      generator,
      lock: new SessionLock(),
      fallbacks,
      config: sessionConfig,
    });
    const records = new MongoInterviewRecordRepository();
    const sessionController = new SessionController({
      agent,
      store,
      records,
      evaluation: new EvaluationService(generator, fallbacks),
      fallbacks,
    });

    const performanceController = new PerformanceController(new PerformanceService(records));

    const app = createApp(
      { sessions: sessionController, performance: performanceController },
      { frontendUrl: serverConfig.frontendUrl }
    );
    const httpServer = createServer(app);
    const io = new Server(httpServer, {
      cors: { origin: serverConfig.frontendUrl, credentials: true },
    });
    registerInterviewSocket(io, agent);

    httpServer.listen(serverConfig.port, () => {
      console.log(`✓ Server running on port ${serverConfig.port}`);
      console.log(`✓ Environment: ${serverConfig.nodeEnv}`);
    });

    const shutdown = async (signal: string) => {
      console.log(`${signal} signal received: closing server gracefully`);
      try {
        // Closes the attached HTTP server as well
        await io.close();
        await disconnectRedis(redisClient);
        await disconnectDatabase();
        process.exit(0);
      } catch (error) {
        console.error('Error during shutdown:', error);
        process.exit(1);
      }
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));
  } catch (error) {
    console.error('Failed to start server:', error);
    await disconnectRedis(redisClient);
    process.exit(1);
  }
};

void startServer();
