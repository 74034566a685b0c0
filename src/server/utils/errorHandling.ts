/**
 * Error handling utilities for route handlers
 */

import type { Request, Response, NextFunction } from 'express';

/**
 * Wraps an async route handler to automatically catch errors and pass them to Express error middleware
 *
 * Usage:
 * ```typescript
 * router.post('/text', asyncHandler(async (req, res) => {
 *   const report = await pipeline.analyze({ kind: 'text', text: req.body.text });
 *   res.json(toAnalysisResponse(report));
 * }));
 * ```
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
