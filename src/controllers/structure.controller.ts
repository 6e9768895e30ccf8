import { Request, Response, NextFunction } from 'express';
import type {
  AnalyzeStructureInput,
  HeadingsInput,
  ReadingOrderInput,
  TablesInput,
  ValidateStructureInput,
} from '../schemas/structure.schemas';
import {
  HeadingCheckerPresets,
  ReadingOrderPresets,
  StructureAnalyzerPresets,
  buildTree,
  structureValidationService,
} from '../services/structure';

/**
 * Request bodies reach these handlers already parsed by the `validate`
 * middleware against the matching schema.
 */
export class StructureController {
  async validate(req: Request, res: Response, next: NextFunction) {
    try {
      const body: ValidateStructureInput = req.body;
      const report = structureValidationService.validate(buildTree(body.tree), body.options);

      res.json({ success: true, data: report });
    } catch (error) {
      next(error);
    }
  }

  async analyze(req: Request, res: Response, next: NextFunction) {
    try {
      const body: AnalyzeStructureInput = req.body;
      const preset = body.preset ? StructureAnalyzerPresets[body.preset] : {};
      const result = structureValidationService.analyzeStructure(buildTree(body.tree), {
        ...preset,
        ...body.options,
      });

      res.json({ success: true, data: result });
    } catch (error) {
      next(error);
    }
  }

  async headings(req: Request, res: Response, next: NextFunction) {
    try {
      const body: HeadingsInput = req.body;
      const preset = body.preset ? HeadingCheckerPresets[body.preset] : {};
      const result = structureValidationService.checkHeadings(buildTree(body.tree), {
        ...preset,
        ...body.options,
      });

      res.json({ success: true, data: result });
    } catch (error) {
      next(error);
    }
  }

  async readingOrder(req: Request, res: Response, next: NextFunction) {
    try {
      const body: ReadingOrderInput = req.body;
      const preset = body.preset ? ReadingOrderPresets[body.preset] : {};
      const result = structureValidationService.validateReadingOrder(buildTree(body.tree), {
        ...preset,
        ...body.options,
      });

      res.json({ success: true, data: result });
    } catch (error) {
      next(error);
    }
  }

  async tables(req: Request, res: Response, next: NextFunction) {
    try {
      const body: TablesInput = req.body;
      const results = structureValidationService.validateTables(buildTree(body.tree));

      res.json({
        success: true,
        data: {
          tables: results,
          passed: results.every(result => result.passed),
        },
      });
    } catch (error) {
      next(error);
    }
  }
}

export const structureController = new StructureController();
