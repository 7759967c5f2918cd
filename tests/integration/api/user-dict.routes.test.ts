/**
 * User Dict Routes Integration Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'path';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../../../src/app';
import { toRecord } from '../../../src/user-dict';
import { BASE_LEXICON_LINE, buildProperty, createHarness } from '../../helpers/factories';
import type { TestHarness } from '../../helpers/factories';
import { createTempDir, removeTempDir, writeBaseLexicon } from '../../helpers/temp-dir';

const WORD_ID = '11111111-1111-4111-8111-111111111111';
const MISSING_ID = '33333333-3333-4333-8333-333333333333';
const HEX_ID = 'abcdef01-2345-4abc-8def-0123456789ab';

describe('User Dict API', () => {
  let root: string;
  let h: TestHarness;
  let app: Express;

  beforeEach(async () => {
    root = await createTempDir();
    h = createHarness(root);
    await writeBaseLexicon(h.baseLexiconDir, 'base', BASE_LEXICON_LINE);
    app = createApp({ userDictService: h.service, activeDictionary: h.activeDictionary });
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  describe('GET /health', () => {
    it('should report the active dictionary', async () => {
      await h.service.initialize();

      const res = await request(app).get('/health');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        status: 'ok',
        activeDictionary: path.resolve(h.compiledDictPath),
      });
    });
  });

  describe('GET /user_dict', () => {
    it('should return an empty dictionary initially', async () => {
      const res = await request(app).get('/user_dict');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ success: true, data: {} });
    });
  });

  describe('GET /user_dict/part_of_speech', () => {
    it('should list the part-of-speech table', async () => {
      const res = await request(app).get('/user_dict/part_of_speech');

      expect(res.status).toBe(200);
      expect(res.body.data).toHaveLength(5);
      expect(res.body.data[0].wordType).toBe('PROPER_NOUN');
    });
  });

  describe('POST /user_dict', () => {
    it('should add a word and return its id', async () => {
      const res = await request(app)
        .post('/user_dict')
        .send({ surface: 'test', pronunciation: 'てすと', accentType: 1 });

      expect(res.status).toBe(201);
      expect(res.body.success).toBe(true);

      const list = await request(app).get('/user_dict');
      expect(list.body.data[res.body.data.id]).toEqual(toRecord(buildProperty()));
    });

    it('should return 400 when required fields are missing', async () => {
      const res = await request(app).post('/user_dict').send({ surface: 'test' });

      expect(res.status).toBe(400);
      expect(res.body.code).toBe('BAD_REQUEST');
    });

    it('should return 422 for an invalid pronunciation', async () => {
      const res = await request(app)
        .post('/user_dict')
        .send({ surface: 'test', pronunciation: 'abc', accentType: 0 });

      expect(res.status).toBe(422);
      expect(res.body).toEqual({
        success: false,
        error: '发音必须是有效的片假名',
        code: 'VALIDATION_ERROR',
      });
    });

    it('should return 422 for an out-of-range priority', async () => {
      const res = await request(app)
        .post('/user_dict')
        .send({ surface: 'test', pronunciation: 'テスト', accentType: 1, priority: 11 });

      expect(res.status).toBe(422);
    });
  });

  describe('PUT /user_dict/:wordId', () => {
    it('should update an existing word', async () => {
      await h.store.writeAll({ [WORD_ID]: toRecord(buildProperty()) });

      const res = await request(app)
        .put(`/user_dict/${WORD_ID}`)
        .send({ surface: '猫', pronunciation: 'ネコ', accentType: 1, wordType: 'COMMON_NOUN' });

      expect(res.status).toBe(200);
      const dict = await h.store.readAll();
      expect(dict[WORD_ID].surface).toBe('猫');
      expect(dict[WORD_ID].contextId).toBe(1345);
    });

    it('should accept an upper-case id for an existing word', async () => {
      await h.store.writeAll({ [HEX_ID]: toRecord(buildProperty()) });

      const res = await request(app)
        .put(`/user_dict/${HEX_ID.toUpperCase()}`)
        .send(buildProperty({ accentType: 0 }));

      expect(res.status).toBe(200);
      expect((await h.store.readAll())[HEX_ID].accentType).toBe(0);
    });

    it('should return 404 for an unknown id', async () => {
      const res = await request(app).put(`/user_dict/${MISSING_ID}`).send(buildProperty());

      expect(res.status).toBe(404);
      expect(res.body.code).toBe('NOT_FOUND');
    });

    it('should return 400 for a malformed id', async () => {
      const res = await request(app).put('/user_dict/not-a-uuid').send(buildProperty());

      expect(res.status).toBe(400);
      expect(res.body.error).toBe('单词 ID 必须是 UUID');
    });
  });

  describe('DELETE /user_dict/:wordId', () => {
    it('should delete the word and then return 404', async () => {
      await h.store.writeAll({ [WORD_ID]: toRecord(buildProperty()) });

      const first = await request(app).delete(`/user_dict/${WORD_ID}`);
      const second = await request(app).delete(`/user_dict/${WORD_ID}`);

      expect(first.status).toBe(200);
      expect(second.status).toBe(404);
      expect(await h.store.readAll()).toEqual({});
    });
  });

  describe('POST /user_dict/import', () => {
    it('should import full records and properties', async () => {
      const otherId = '22222222-2222-4222-8222-222222222222';

      const res = await request(app)
        .post('/user_dict/import')
        .send({
          words: {
            [WORD_ID]: toRecord(buildProperty()),
            [otherId]: buildProperty({ surface: '猫', pronunciation: 'ネコ' }),
          },
        });

      expect(res.status).toBe(200);
      expect(Object.keys(await h.store.readAll()).sort()).toEqual([WORD_ID, otherId]);
    });

    it('should reject an incomplete record instead of treating it as a word property', async () => {
      const { moraCount: _moraCount, ...incomplete } = toRecord(buildProperty({ wordType: 'VERB' }));

      const res = await request(app)
        .post('/user_dict/import')
        .send({
          words: {
            [WORD_ID]: { ...incomplete, partOfSpeech: '存在しない', accentAssociativeRule: 'C9' },
          },
        });

      expect(res.status).toBe(400);
      expect(res.body.code).toBe('BAD_REQUEST');
      expect(await h.store.readAll()).toEqual({});
      expect(h.compiler.calls).toHaveLength(0);
    });

    it('should reject a word property with unknown fields', async () => {
      const res = await request(app)
        .post('/user_dict/import')
        .send({ words: { [WORD_ID]: { ...buildProperty(), contextId: 642 } } });

      expect(res.status).toBe(400);
      expect(await h.store.readAll()).toEqual({});
    });

    it('should return 422 for a complete record with an unsupported part of speech', async () => {
      const res = await request(app)
        .post('/user_dict/import')
        .send({ words: { [WORD_ID]: { ...toRecord(buildProperty()), partOfSpeech: '存在しない' } } });

      expect(res.status).toBe(422);
      expect(res.body.code).toBe('VALIDATION_ERROR');
      expect(await h.store.readAll()).toEqual({});
    });

    it('should respect the override flag', async () => {
      await h.store.writeAll({ [WORD_ID]: toRecord(buildProperty()) });
      const replacement = toRecord(buildProperty({ surface: '猫', pronunciation: 'ネコ' }));

      await request(app).post('/user_dict/import').send({ words: { [WORD_ID]: replacement } });
      expect((await h.store.readAll())[WORD_ID].surface).toBe('ｔｅｓｔ');

      await request(app)
        .post('/user_dict/import')
        .send({ words: { [WORD_ID]: replacement }, override: true });
      expect((await h.store.readAll())[WORD_ID].surface).toBe('猫');
    });
  });

  describe('unknown routes', () => {
    it('should return 404', async () => {
      const res = await request(app).get('/nowhere');

      expect(res.status).toBe(404);
      expect(res.body.code).toBe('NOT_FOUND');
    });
  });
});
