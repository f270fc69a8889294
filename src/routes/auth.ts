import { Router, Request, Response, RequestHandler } from 'express';
import { ClientContext, TokenPair } from '../models/auth';
import {
  AuthService,
  EMAIL_TAKEN,
  INVALID_CREDENTIALS,
  TOKEN_NOT_FOUND,
  USERNAME_TAKEN,
} from '../services/auth.service';
import {
  validateLoginRequest,
  validateRefreshRequest,
  validateRegisterRequest,
  validateRevokeRequest,
} from '../utils/validation';
import { Logger } from '../utils/logger';

function clientContext(req: Request): ClientContext {
  return {
    ip: req.ip || req.socket.remoteAddress || null,
    deviceInfo: req.get('user-agent') || null,
  };
}

function tokenResponse(tokens: TokenPair) {
  return {
    tokenType: 'Bearer',
    accessToken: tokens.accessToken,
    refreshToken: tokens.refreshToken,
    accessTokenExpiresAt: tokens.accessTokenExpiresAt.toISOString(),
    refreshTokenExpiresAt: tokens.refreshTokenExpiresAt.toISOString(),
  };
}

/**
 * @swagger
 * components:
 *   schemas:
 *     RegisterRequest:
 *       type: object
 *       required:
 *         - username
 *         - email
 *         - password
 *         - confirmPassword
 *       properties:
 *         username:
 *           type: string
 *         email:
 *           type: string
 *           format: email
 *         password:
 *           type: string
 *         confirmPassword:
 *           type: string
 *         firstName:
 *           type: string
 *         lastName:
 *           type: string
 *     LoginRequest:
 *       type: object
 *       required:
 *         - username
 *         - password
 *       properties:
 *         username:
 *           type: string
 *         password:
 *           type: string
 *     RefreshRequest:
 *       type: object
 *       required:
 *         - accessToken
 *         - refreshToken
 *       properties:
 *         accessToken:
 *           type: string
 *           description: The last access token issued, expired or not
 *         refreshToken:
 *           type: string
 *     RevokeRequest:
 *       type: object
 *       required:
 *         - token
 *       properties:
 *         token:
 *           type: string
 *           description: Refresh token to revoke
 *     TokenResponse:
 *       type: object
 *       properties:
 *         tokenType:
 *           type: string
 *           example: Bearer
 *         accessToken:
 *           type: string
 *         refreshToken:
 *           type: string
 *         accessTokenExpiresAt:
 *           type: string
 *           format: date-time
 *         refreshTokenExpiresAt:
 *           type: string
 *           format: date-time
 *     UserResponse:
 *       type: object
 *       properties:
 *         id:
 *           type: string
 *           format: uuid
 *         username:
 *           type: string
 *         email:
 *           type: string
 *         roles:
 *           type: array
 *           items:
 *             type: string
 */
export function createAuthRouter(authService: AuthService, requireAuth: RequestHandler): Router {
  const authRouter = Router();

  /**
   * @swagger
   * /auth/register:
   *   post:
   *     summary: Create a user account
   *     tags: [Auth]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/RegisterRequest'
   *     responses:
   *       201:
   *         description: Account created
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/UserResponse'
   *       400:
   *         description: Invalid input or password policy violation
   *       409:
   *         description: Username or email already in use
   */
  authRouter.post('/register', async (req: Request, res: Response) => {
    const validation = validateRegisterRequest(req.body);
    if (!validation.valid || !validation.data) {
      res.status(400).json({ error: 'Validation failed', details: validation.errors });
      return;
    }

    try {
      const result = await authService.register(validation.data, clientContext(req).ip);
      if (!result.success) {
        const status = result.error === USERNAME_TAKEN || result.error === EMAIL_TAKEN ? 409 : 400;
        res.status(status).json({ error: result.error });
        return;
      }

      res.status(201).json(result.value);
    } catch (error) {
      Logger.error('Failed to register user', error);
      res.status(500).json({ error: 'Registration failed' });
    }
  });

  /**
   * @swagger
   * /auth/login:
   *   post:
   *     summary: Login with username and password
   *     tags: [Auth]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/LoginRequest'
   *     responses:
   *       200:
   *         description: Access and refresh token pair
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/TokenResponse'
   *       401:
   *         description: Invalid credentials
   */
  authRouter.post('/login', async (req: Request, res: Response) => {
    const validation = validateLoginRequest(req.body);
    if (!validation.valid || !validation.data) {
      res.status(400).json({ error: 'Validation failed', details: validation.errors });
      return;
    }

    try {
      const result = await authService.login(validation.data, clientContext(req));
      if (!result.success) {
        res.status(result.error === INVALID_CREDENTIALS ? 401 : 500).json({ error: result.error });
        return;
      }

      res.json({ ...tokenResponse(result.value.tokens), user: result.value.user });
    } catch (error) {
      Logger.error('Login failed', error);
      res.status(500).json({ error: 'Login failed' });
    }
  });

  /**
   * @swagger
   * /auth/refresh:
   *   post:
   *     summary: Exchange a token pair for a new one
   *     description: The presented refresh token is rotated and cannot be used again.
   *     tags: [Auth]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/RefreshRequest'
   *     responses:
   *       200:
   *         description: New token pair
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/TokenResponse'
   *       401:
   *         description: Invalid token pair
   */
  authRouter.post('/refresh', async (req: Request, res: Response) => {
    const validation = validateRefreshRequest(req.body);
    if (!validation.valid || !validation.data) {
      res.status(400).json({ error: 'Validation failed', details: validation.errors });
      return;
    }

    try {
      const result = await authService.refresh(validation.data, clientContext(req));
      if (!result.success) {
        res.status(401).json({ error: result.error });
        return;
      }

      res.json(tokenResponse(result.value));
    } catch (error) {
      Logger.error('Token refresh failed', error);
      res.status(500).json({ error: 'Token refresh failed' });
    }
  });

  /**
   * @swagger
   * /auth/revoke:
   *   post:
   *     summary: Revoke one of the caller's refresh tokens
   *     tags: [Auth]
   *     security:
   *       - bearerAuth: []
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/RevokeRequest'
   *     responses:
   *       204:
   *         description: Token revoked
   *       401:
   *         description: Not authenticated
   *       404:
   *         description: Token not found
   */
  authRouter.post('/revoke', requireAuth, async (req: Request, res: Response) => {
    const auth = req.auth;
    if (!auth) {
      res.status(401).json({ error: 'Authentication required' });
      return;
    }

    const validation = validateRevokeRequest(req.body);
    if (!validation.valid || !validation.data) {
      res.status(400).json({ error: 'Validation failed', details: validation.errors });
      return;
    }

    try {
      const result = await authService.revokeToken(auth.sub, validation.data.token, clientContext(req));
      if (!result.success) {
        res.status(result.error === TOKEN_NOT_FOUND ? 404 : 500).json({ error: result.error });
        return;
      }

      res.status(204).send();
    } catch (error) {
      Logger.error('Token revocation failed', error, { userId: auth.sub });
      res.status(500).json({ error: 'Token revocation failed' });
    }
  });

  /**
   * @swagger
   * /auth/logout:
   *   post:
   *     summary: End every session of the current user
   *     tags: [Auth]
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       204:
   *         description: Logged out
   *       401:
   *         description: Not authenticated
   */
  authRouter.post('/logout', requireAuth, async (req: Request, res: Response) => {
    const auth = req.auth;
    if (!auth) {
      res.status(401).json({ error: 'Authentication required' });
      return;
    }

    try {
      const result = await authService.logout(auth.sub, auth.jti, new Date(auth.exp * 1000), clientContext(req));
      if (!result.success) {
        res.status(500).json({ error: result.error });
        return;
      }

      res.status(204).send();
    } catch (error) {
      Logger.error('Logout failed', error, { userId: auth.sub });
      res.status(500).json({ error: 'Logout failed' });
    }
  });

  /**
   * @swagger
   * /auth/me:
   *   get:
   *     summary: Claims of the current access token
   *     tags: [Auth]
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: Current user
   *       401:
   *         description: Not authenticated
   */
  authRouter.get('/me', requireAuth, (req: Request, res: Response) => {
    const auth = req.auth;
    if (!auth) {
      res.status(401).json({ error: 'Authentication required' });
      return;
    }

    res.json({
      id: auth.sub,
      username: auth.username,
      email: auth.email,
      roles: auth.roles,
      clientId: auth.client_id,
    });
  });

  return authRouter;
}
