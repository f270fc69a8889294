import { Router, Request, Response } from 'express';
import { getDatabase, hasDatabase } from '../database';
import { Logger } from '../utils/logger';

export const healthRouter = Router();

/**
 * @swagger
 * /health:
 *   get:
 *     summary: Health check endpoint
 *     tags: [Health]
 *     responses:
 *       200:
 *         description: Service is healthy
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 status:
 *                   type: string
 *                   example: ok
 *                 database:
 *                   type: string
 *                   enum: [connected, disconnected, in-memory]
 *                 timestamp:
 *                   type: string
 *                   format: date-time
 *       503:
 *         description: Database unavailable
 */
healthRouter.get('/', async (req: Request, res: Response) => {
  try {
    let database = 'in-memory';
    if (hasDatabase()) {
      const db = getDatabase();
      await db.query('SELECT 1');
      database = db.isConnected() ? 'connected' : 'disconnected';
    }

    res.status(200).json({
      status: 'ok',
      database,
      timestamp: new Date().toISOString(),
    });
  } catch (error) {
    Logger.error('Health check failed', error, {
      method: 'GET',
      url: '/health',
    });
    res.status(503).json({
      status: 'error',
      message: 'Service unavailable',
      timestamp: new Date().toISOString(),
    });
  }
});
