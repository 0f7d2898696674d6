import { createClient } from 'redis';

export type RedisClient = ReturnType<typeof createClient>;

export const connectRedis = async (): Promise<RedisClient> => {
  try {
    const redisClient = createClient({
      socket: {
        host: process.env.REDIS_HOST || 'localhost',
        port: parseInt(process.env.REDIS_PORT || '6379', 10),
        connectTimeout: 5000,
      },
      password: process.env.REDIS_PASSWORD || undefined,
    });

    redisClient.on('error', (err) => console.error('Redis Client Error', err));
    redisClient.on('connect', () => console.log('Redis Client Connected'));

    await redisClient.connect();

    return redisClient;
  } catch (error) {
    console.error('Failed to connect to Redis:', error);
    throw error;
  }
};

export const disconnectRedis = async (redisClient: RedisClient | null): Promise<void> => {
  if (redisClient?.isOpen) {
    await redisClient.quit();
  }
};
