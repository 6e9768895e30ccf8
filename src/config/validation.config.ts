/**
 * Analyzer defaults.
 *
 * Every tolerance the analyzers use can be overridden from the environment;
 * values that do not parse as finite numbers keep the default.
 */

const readNumber = (name: string, fallback: number): number => {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export const validationConfig = {
  readingOrder: {
    verticalTolerance: readNumber('READING_ORDER_VERTICAL_TOLERANCE', 5),
    horizontalTolerance: readNumber('READING_ORDER_HORIZONTAL_TOLERANCE', 10),
    overlapThreshold: readNumber('READING_ORDER_OVERLAP_THRESHOLD', 0.1),
    columnGapThreshold: readNumber('READING_ORDER_COLUMN_GAP', 50),
  },
  headings: {
    maxHeadingLevel: readNumber('HEADING_MAX_LEVEL', 6),
    minHeadingTextLength: readNumber('HEADING_MIN_TEXT_LENGTH', 1),
  },
  structure: {
    // 0 disables the depth limit
    maxDepth: readNumber('STRUCTURE_MAX_DEPTH', 0),
  },
};

export type ValidationConfig = typeof validationConfig;
