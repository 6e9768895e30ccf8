/**
 * Structure Validation API Tests
 *
 * Exercises the Express app in process through supertest.
 */
import { describe, it, expect, vi } from 'vitest';
import request from 'supertest';
import app from '../../src/app';
import { config } from '../../src/config';

vi.mock('../../src/lib/logger', () => ({
  logger: { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() },
}));

const area = { pageIndex: 0, x: 0, y: 0, width: 100, height: 10 };

const textBlocks = (value: string) => [{ box: area, lines: [{ box: area, chunks: [{ box: area, value }] }] }];

const heading = (level: number, value: string) => ({ role: `H${level}`, textBlocks: textBlocks(value) });

describe('Structure API', () => {
  describe('GET /health', () => {
    it('should return healthy status', async () => {
      const response = await request(app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('healthy');
      expect(response.body.version).toBe(config.version);
    });
  });

  describe('GET /api/v1', () => {
    it('should return API info and available endpoints', async () => {
      const response = await request(app).get('/api/v1');

      expect(response.status).toBe(200);
      expect(response.body.name).toBe('Tagged Structure Validator API');
      expect(response.body.endpoints.structure.validate).toBe('POST /api/v1/structure/validate');
    });
  });

  describe('POST /api/v1/structure/validate', () => {
    it('should pass a well-formed document', async () => {
      const response = await request(app)
        .post('/api/v1/structure/validate')
        .send({
          tree: {
            id: 'doc',
            role: 'Document',
            children: [heading(1, 'Guide'), { role: 'P', textBlocks: textBlocks('Body text') }],
          },
        });

      expect(response.status).toBe(200);
      expect(response.body.success).toBe(true);
      expect(response.body.data.rootId).toBe('doc');
      expect(response.body.data.passed).toBe(true);
      expect(response.body.data.findings).toEqual([]);
      expect(response.body.data.structure).toEqual({ totalNodeCount: 3, maxDepth: 1 });
    });

    it('should report a skipped heading level', async () => {
      const response = await request(app)
        .post('/api/v1/structure/validate')
        .send({
          tree: {
            role: 'Document',
            children: [heading(1, 'Guide'), { id: 'deep', ...heading(3, 'Details') }],
          },
        });

      expect(response.status).toBe(200);
      expect(response.body.data.passed).toBe(false);
      expect(response.body.data.findings).toHaveLength(1);
      expect(response.body.data.findings[0]).toMatchObject({
        id: 'heading-1',
        category: 'heading',
        code: 'level-skipped',
        severity: 'critical',
        nodeId: 'deep',
        context: { previousLevel: '1', currentLevel: '3', skippedLevels: '1' },
      });
      expect(response.body.data.annotations).toEqual({ deep: ['HEADING_LEVEL_SKIPPED'] });
    });

    it('should honour analyzer options', async () => {
      const response = await request(app)
        .post('/api/v1/structure/validate')
        .send({
          tree: { role: 'Document', children: [heading(1, 'Guide'), heading(3, 'Details')] },
          options: { headings: { checkSkippedLevels: false } },
        });

      expect(response.status).toBe(200);
      expect(response.body.data.passed).toBe(true);
    });

    it('should reject unknown option names', async () => {
      const response = await request(app)
        .post('/api/v1/structure/validate')
        .send({ tree: { role: 'Document' }, options: { headings: { skipAll: true } } });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('POST /api/v1/structure/analyze', () => {
    it('should apply a preset and report illegal nesting', async () => {
      const response = await request(app)
        .post('/api/v1/structure/analyze')
        .send({
          preset: 'nestingOnly',
          tree: { role: 'L', children: [{ id: 'para', role: 'P', textBlocks: textBlocks('Loose text') }] },
        });

      expect(response.status).toBe(200);
      expect(response.body.data.errors).toEqual([
        {
          id: 'structure-1',
          code: 'UNEXPECTED_CHILD',
          nodeId: 'para',
          role: 'P',
          message: "Invalid child type 'P' for parent 'L'",
          context: { parentType: 'L', childType: 'P' },
        },
      ]);
      expect(response.body.data.isValid).toBe(false);
    });
  });

  describe('POST /api/v1/structure/headings', () => {
    it('should skip document-level checks with the basic preset', async () => {
      const response = await request(app)
        .post('/api/v1/structure/headings')
        .send({ preset: 'basic', tree: { role: 'Document', children: [heading(2, 'Intro'), heading(3, 'Scope')] } });

      expect(response.status).toBe(200);
      expect(response.body.data.issues).toEqual([]);
      expect(response.body.data.headingsByLevel).toEqual({ 2: 1, 3: 1 });
    });
  });

  describe('POST /api/v1/structure/reading-order', () => {
    const tree = {
      role: 'Document',
      children: [
        { id: 'right', role: 'P', box: { pageIndex: 0, x: 200, y: 700, width: 100, height: 4 }, textBlocks: textBlocks('a') },
        { id: 'left', role: 'P', box: { pageIndex: 0, x: 0, y: 700, width: 100, height: 4 }, textBlocks: textBlocks('b') },
      ],
    };

    it('should flag leftward travel for left-to-right text', async () => {
      const response = await request(app).post('/api/v1/structure/reading-order').send({ tree });

      expect(response.status).toBe(200);
      expect(response.body.data.issues).toHaveLength(1);
      expect(response.body.data.issues[0]).toMatchObject({
        type: 'reverse-direction',
        nodeId: 'right',
        relatedNodeId: 'left',
      });
    });

    it('should accept the same layout with the right-to-left preset', async () => {
      const response = await request(app).post('/api/v1/structure/reading-order').send({ tree, preset: 'rightToLeft' });

      expect(response.status).toBe(200);
      expect(response.body.data.issues).toEqual([]);
      expect(response.body.data.pageCount).toBe(1);
    });
  });

  describe('POST /api/v1/structure/tables', () => {
    it('should validate every table in the tree', async () => {
      const row = { role: 'TR', children: [{ role: 'TD', textBlocks: textBlocks('1') }] };
      const response = await request(app)
        .post('/api/v1/structure/tables')
        .send({ tree: { role: 'Document', children: [{ id: 'grid', role: 'Table', children: [row, row] }] } });

      expect(response.status).toBe(200);
      expect(response.body.data.passed).toBe(false);
      expect(response.body.data.tables).toHaveLength(1);
      expect(response.body.data.tables[0].tableId).toBe('grid');
      expect(response.body.data.tables[0].errors.map((error: { type: string }) => error.type)).toEqual([
        'missing-headers',
      ]);
    });
  });

  describe('error responses', () => {
    it('should return 400 with field details for an invalid body', async () => {
      const response = await request(app).post('/api/v1/structure/validate').send({ tree: { role: '' } });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        success: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Request validation failed',
          details: [{ field: 'tree.role', message: 'Role is required', code: 'too_small' }],
        },
      });
    });

    it('should return 400 for malformed JSON', async () => {
      const response = await request(app)
        .post('/api/v1/structure/validate')
        .set('Content-Type', 'application/json')
        .send('{"tree":');

      expect(response.status).toBe(400);
      expect(response.body.error).toEqual({ message: 'Request body is not valid JSON', code: 'BAD_REQUEST' });
    });

    it('should return 422 for an unknown structure type', async () => {
      const response = await request(app)
        .post('/api/v1/structure/validate')
        .send({ tree: { role: 'Document', children: [{ role: 'Bogus' }] } });

      expect(response.status).toBe(422);
      expect(response.body.success).toBe(false);
      expect(response.body.error).toEqual({
        message: "Unknown structure type 'Bogus' at tree.children[0]",
        code: 'TREE_DECODE_ERROR',
        details: { path: 'tree.children[0]', role: 'Bogus' },
      });
    });

    it('should return 404 for unknown routes', async () => {
      const response = await request(app).get('/api/v1/unknown');

      expect(response.status).toBe(404);
      expect(response.body.error).toEqual({ message: 'Route GET /api/v1/unknown not found', code: 'NOT_FOUND' });
    });
  });
});
