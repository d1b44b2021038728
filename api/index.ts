import type { VercelRequest, VercelResponse } from '@vercel/node';
import { buildApp } from '../src/api/server.js';

const app = buildApp();

// Export for Vercel
export default function handler(req: VercelRequest, res: VercelResponse) {
  app(req, res);
}
