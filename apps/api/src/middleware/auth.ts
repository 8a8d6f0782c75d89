import type { NextFunction, Request, RequestHandler, Response } from 'express';
import jwt from 'jsonwebtoken';
import { toActor, type Actor } from '@salesdesk/core';
import type { UserRepository } from '@salesdesk/storage';

import { logger } from '../config/logger';

// =============================================================================
// Types
// =============================================================================

export interface AuthenticatedUser extends Actor {
  email: string;
  firstName: string;
  lastName: string;
}

declare global {
  namespace Express {
    interface Request {
      user?: AuthenticatedUser;
      rid?: string;
    }
  }
}

const ACCESS_TOKEN_TYPE = 'access';

interface AccessTokenClaims {
  sub: string;
  tenantId: string;
}

const readClaims = (decoded: string | jwt.JwtPayload): AccessTokenClaims | null => {
  if (typeof decoded === 'string') {
    return null;
  }

  const { sub, tenantId, type } = decoded;
  if (typeof sub !== 'string' || typeof tenantId !== 'string' || !sub || !tenantId) {
    return null;
  }

  if (type !== undefined && type !== ACCESS_TOKEN_TYPE) {
    return null;
  }

  return { sub, tenantId };
};

const respondUnauthorized = (res: Response, message = 'Missing or invalid token', code = 'UNAUTHORIZED') =>
  res.status(401).json({
    success: false,
    error: {
      code,
      message,
    },
  });

// =============================================================================
// Middleware Functions
// =============================================================================

export interface AuthMiddlewareDependencies {
  users: Pick<UserRepository, 'findById'>;
  getSecret: () => string;
}

export const createAuthMiddleware = ({ users, getSecret }: AuthMiddlewareDependencies): RequestHandler =>
  async (req: Request, res: Response, next: NextFunction) => {
    if (req.method === 'OPTIONS') {
      return next();
    }

    const authorization = req.headers.authorization;
    if (!authorization || !authorization.startsWith('Bearer ')) {
      return respondUnauthorized(res);
    }

    const token = authorization.slice('Bearer '.length).trim();
    if (!token) {
      return respondUnauthorized(res);
    }

    let claims: AccessTokenClaims | null;
    try {
      claims = readClaims(jwt.verify(token, getSecret()));
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        return respondUnauthorized(res, 'Authentication token has expired', 'TOKEN_EXPIRED');
      }
      logger.warn('[auth] token rejected', { error: error instanceof Error ? error.message : String(error) });
      return respondUnauthorized(res, 'Invalid authentication token', 'INVALID_TOKEN');
    }

    if (!claims) {
      return respondUnauthorized(res);
    }

    try {
      const user = await users.findById(claims.sub);
      if (!user || !user.isActive || user.tenantId !== claims.tenantId) {
        return respondUnauthorized(res, 'User not found or inactive');
      }

      req.user = {
        ...toActor(user),
        email: user.email,
        firstName: user.firstName,
        lastName: user.lastName,
      };
      return next();
    } catch (error) {
      return next(error);
    }
  };
