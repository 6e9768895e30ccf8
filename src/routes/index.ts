import { Router } from 'express';
import { config } from '../config';
import structureRoutes from './structure.routes';

const router = Router();

router.get('/', (req, res) => {
  res.json({
    name: 'Tagged Structure Validator API',
    version: config.version,
    endpoints: {
      health: 'GET /health',
      structure: {
        validate: 'POST /api/v1/structure/validate',
        analyze: 'POST /api/v1/structure/analyze',
        headings: 'POST /api/v1/structure/headings',
        readingOrder: 'POST /api/v1/structure/reading-order',
        tables: 'POST /api/v1/structure/tables',
      },
    },
  });
});

router.use('/structure', structureRoutes);

export default router;
