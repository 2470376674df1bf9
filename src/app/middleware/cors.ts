import type { Request, Response, NextFunction } from 'express';

function makeCors(allowMethods: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
    res.setHeader('Access-Control-Allow-Methods', allowMethods);

    // Preflight never reaches the route handlers.
    if (req.method === 'OPTIONS') {
      return res.status(204).end();
    }
    return next();
  };
}

// The game UI may be served from another origin than the API.
export const corsMiddleware = makeCors('GET,POST,OPTIONS');
