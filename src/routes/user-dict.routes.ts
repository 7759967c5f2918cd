import { Router } from 'express';
import type { UserDictService } from '../services/user-dict.service';
import {
  importWordsSchema,
  wordIdParamsSchema,
  wordPropertySchema,
} from '../validators/user-dict.validator';

/**
 * 用户词典路由
 * 错误统一交给 errorHandler 转换为响应
 */
export function createUserDictRouter(service: UserDictService): Router {
  const router = Router();

  // 获取全部单词
  router.get('/', async (_req, res, next) => {
    try {
      const words = await service.listWords();

      res.json({
        success: true,
        data: words,
      });
    } catch (error) {
      next(error);
    }
  });

  // 获取品詞参照表
  router.get('/part_of_speech', (_req, res) => {
    res.json({
      success: true,
      data: service.listPartOfSpeech(),
    });
  });

  // 添加单词
  router.post('/', async (req, res, next) => {
    try {
      const property = wordPropertySchema.parse(req.body);
      const wordId = await service.addWord(property);

      res.status(201).json({
        success: true,
        data: { id: wordId },
      });
    } catch (error) {
      next(error);
    }
  });

  // 批量导入单词
  router.post('/import', async (req, res, next) => {
    try {
      const { words, override } = importWordsSchema.parse(req.body);
      await service.importWords(words, override);

      res.json({
        success: true,
        message: '用户词典导入成功',
      });
    } catch (error) {
      next(error);
    }
  });

  // 更新单词
  router.put('/:wordId', async (req, res, next) => {
    try {
      const { wordId } = wordIdParamsSchema.parse(req.params);
      const property = wordPropertySchema.parse(req.body);
      await service.updateWord(wordId, property);

      res.json({
        success: true,
        message: '单词更新成功',
      });
    } catch (error) {
      next(error);
    }
  });

  // 删除单词
  router.delete('/:wordId', async (req, res, next) => {
    try {
      const { wordId } = wordIdParamsSchema.parse(req.params);
      await service.deleteWord(wordId);

      res.json({
        success: true,
        message: '单词删除成功',
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
