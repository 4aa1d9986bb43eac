/**
 * Authentication Routes
 *
 * POST /api/register        - Create new account
 * POST /api/login           - Get JWT token
 * GET  /api/profile         - Current account
 * PUT  /api/change-password - Rotate password
 */

import { Router, Response, NextFunction } from 'express';
import { AuthenticatedRequest } from '../types';
import { withTransaction } from '../models/db';
import * as authService from '../services/auth.service';
import { currentUser, requireAuth } from '../middleware/auth.middleware';
import { requireBody } from '../utils/validation.utils';

const router = Router();

/**
 * POST /api/register
 */
router.post('/register', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
  try {
    const body = requireBody(req.body);
    const user = await withTransaction((tx) => authService.register(tx, body));

    res.status(201).json({
      success: true,
      message: 'Account created',
      data: { user },
    });
  } catch (error) {
    next(error);
  }
});

/**
 * POST /api/login
 */
router.post('/login', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
  try {
    const body = requireBody(req.body);
    const auth = await withTransaction((tx) => authService.login(tx, body));

    res.status(200).json({
      success: true,
      message: 'Logged in',
      data: auth,
    });
  } catch (error) {
    next(error);
  }
});

/**
 * GET /api/profile
 */
router.get('/profile', requireAuth, async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
  try {
    const claims = currentUser(req);
    const user = await withTransaction((tx) => authService.getProfile(tx, claims));

    res.status(200).json({
      success: true,
      data: { user },
    });
  } catch (error) {
    next(error);
  }
});

/**
 * PUT /api/change-password
 */
router.put('/change-password', requireAuth, async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
  try {
    const claims = currentUser(req);
    const body = requireBody(req.body);
    await withTransaction((tx) => authService.changePassword(tx, claims, body));

    res.status(200).json({
      success: true,
      message: 'Password changed',
    });
  } catch (error) {
    next(error);
  }
});

export default router;
