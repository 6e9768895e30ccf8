/**
 * Structure Validation Routes
 *
 * Every route takes `{ tree, options? }` and answers with analyzer findings:
 * - Full report across all analyzers
 * - Structure, heading, reading order and table checks on their own
 */

import { Router } from 'express';
import { structureController } from '../controllers/structure.controller';
import { validate } from '../middleware/validate.middleware';
import {
  analyzeStructureSchema,
  headingsSchema,
  readingOrderSchema,
  tablesSchema,
  validateStructureSchema,
} from '../schemas/structure.schemas';

const router = Router();

/**
 * Run every analyzer and return one report
 * POST /api/v1/structure/validate
 */
router.post(
  '/validate',
  validate({ body: validateStructureSchema }),
  (req, res, next) => structureController.validate(req, res, next)
);

/**
 * Nesting, required children, attributes, empty elements, duplicate ids
 * POST /api/v1/structure/analyze
 */
router.post(
  '/analyze',
  validate({ body: analyzeStructureSchema }),
  (req, res, next) => structureController.analyze(req, res, next)
);

/**
 * Heading outline checks
 * POST /api/v1/structure/headings
 */
router.post(
  '/headings',
  validate({ body: headingsSchema }),
  (req, res, next) => structureController.headings(req, res, next)
);

/**
 * Spatial reading order checks
 * POST /api/v1/structure/reading-order
 */
router.post(
  '/reading-order',
  validate({ body: readingOrderSchema }),
  (req, res, next) => structureController.readingOrder(req, res, next)
);

/**
 * Table structure checks for every table in the tree
 * POST /api/v1/structure/tables
 */
router.post(
  '/tables',
  validate({ body: tablesSchema }),
  (req, res, next) => structureController.tables(req, res, next)
);

export default router;
