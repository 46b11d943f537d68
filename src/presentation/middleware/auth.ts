import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { v4 as uuidv4 } from 'uuid';
import config from '../../config';
import logger, { logError } from '../../utils/logger';

// Extended Request interface with user
export interface AuthenticatedRequest extends Request {
  user?: {
    id: string;
    email: string;
    role: string;
  };
}

// JWT Payload interface
interface JWTPayload {
  userId: string;
  email: string;
  role: string;
}

const isJWTPayload = (value: unknown): value is JWTPayload =>
  typeof value === 'object' &&
  value !== null &&
  'userId' in value &&
  typeof value.userId === 'string' &&
  'email' in value &&
  typeof value.email === 'string' &&
  'role' in value &&
  typeof value.role === 'string';

const unauthorized = (res: Response, code: string, message: string): void => {
  res.status(401).json({
    success: false,
    error: { code, message }
  });
};

// Authentication middleware
export const authenticate = (
  req: AuthenticatedRequest,
  res: Response,
  next: NextFunction
): void => {
  const authHeader = req.headers.authorization;

  if (!authHeader) {
    unauthorized(res, 'UNAUTHORIZED', 'Access token is required');
    return;
  }

  // Check Bearer format
  const parts = authHeader.split(' ');
  if (parts.length !== 2 || parts[0] !== 'Bearer') {
    unauthorized(res, 'UNAUTHORIZED', 'Invalid authorization header format. Use: Bearer <token>');
    return;
  }

  let decoded: unknown;
  try {
    decoded = jwt.verify(parts[1], config.jwt.secret, {
      issuer: config.jwt.issuer
    });
  } catch (error) {
    if (error instanceof jwt.TokenExpiredError) {
      unauthorized(res, 'TOKEN_EXPIRED', 'Access token has expired');
      return;
    }

    if (error instanceof jwt.JsonWebTokenError) {
      unauthorized(res, 'INVALID_TOKEN', 'Invalid access token');
      return;
    }

    logError('Authentication error', error);
    res.status(500).json({
      success: false,
      error: {
        code: 'INTERNAL_ERROR',
        message: 'Authentication failed'
      }
    });
    return;
  }

  if (!isJWTPayload(decoded)) {
    unauthorized(res, 'INVALID_TOKEN', 'Invalid access token');
    return;
  }

  // Attach user to request
  req.user = {
    id: decoded.userId,
    email: decoded.email,
    role: decoded.role
  };

  next();
};

// Role-based authorization middleware
export const authorize = (...allowedRoles: string[]) => {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    if (!req.user) {
      unauthorized(res, 'UNAUTHORIZED', 'Authentication required');
      return;
    }

    if (!allowedRoles.includes(req.user.role)) {
      logger.warn('Authorization failed - insufficient permissions', {
        userId: req.user.id,
        userRole: req.user.role,
        requiredRoles: allowedRoles
      });

      res.status(403).json({
        success: false,
        error: {
          code: 'FORBIDDEN',
          message: 'Insufficient permissions to access this resource'
        }
      });
      return;
    }

    next();
  };
};

// Catalog writes are for administrators only
export const requireAdmin = authorize('ADMIN');

// Request ID middleware for tracking
export const requestId = (
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  const incoming = req.headers['x-request-id'];
  const id = typeof incoming === 'string' && incoming.length > 0 ? incoming : uuidv4();
  req.headers['x-request-id'] = id;
  res.setHeader('X-Request-ID', id);
  next();
};

// Logging middleware for requests
export const requestLogger = (
  req: AuthenticatedRequest,
  res: Response,
  next: NextFunction
): void => {
  const start = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - start;
    const logData = {
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      duration: `${duration}ms`,
      userId: req.user?.id,
      requestId: req.headers['x-request-id'],
      userAgent: req.headers['user-agent'],
      ip: req.ip || req.socket.remoteAddress
    };

    if (res.statusCode >= 400) {
      logger.warn('Request completed with error', logData);
    } else {
      logger.info('Request completed', logData);
    }
  });

  next();
};
