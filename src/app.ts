import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { env } from './config/env';
import { httpLoggerMiddleware } from './logger/http';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';
import { createHealthRouter } from './routes/health.routes';
import { createUserDictRouter } from './routes/user-dict.routes';
import type { UserDictService } from './services/user-dict.service';
import type { ActiveDictionarySlot } from './user-dict';

export interface AppDependencies {
  userDictService: UserDictService;
  activeDictionary: ActiveDictionarySlot;
}

export function createApp({ userDictService, activeDictionary }: AppDependencies): Express {
  const app = express();

  // 请求日志 - 前置以捕获所有请求（包括解析失败的请求）
  app.use(httpLoggerMiddleware);

  app.use(helmet());
  app.use(cors({ origin: env.CORS_ORIGIN }));

  // 批量导入可能较大
  app.use(express.json({ limit: '10mb' }));

  app.use('/health', createHealthRouter(activeDictionary));
  app.use('/user_dict', createUserDictRouter(userDictService));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
