/**
 * Not Found Middleware
 * JSON 404 for any path the health server does not serve.
 */

import type { Request, Response } from "express";

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({ error: `Not found: ${req.method} ${req.path}` });
}
