import { Router } from 'express';
import type { ActiveDictionarySlot } from '../user-dict';

/**
 * 健康检查，附带当前生效的编译词典路径
 */
export function createHealthRouter(activeDictionary: ActiveDictionarySlot): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({
      status: 'ok',
      activeDictionary: activeDictionary.current(),
    });
  });

  return router;
}
