import { Request, Response, NextFunction } from 'express';
import { IdentityResolver } from '../services/identityResolver';
import { isChatError } from '../utils/chatErrors';
import { extractBearerToken } from '../utils/tokenUtils';

const readCredential = (req: Request): string | null => {
  // 1. Authorization header
  const fromHeader = extractBearerToken(req.headers.authorization);
  if (fromHeader) return fromHeader;

  // 2. accessToken cookie (fallback)
  const cookie: unknown = req.cookies ? req.cookies.accessToken : undefined;
  return typeof cookie === 'string' && cookie.length > 0 ? cookie : null;
};

// Middleware that resolves the bearer credential to a local user, provisioning it on first sight
export const createRequireAuth = (resolveIdentity: IdentityResolver) =>
  async (req: Request, res: Response, next: NextFunction) => {
    const credential = readCredential(req);

    if (!credential) {
      const malformed = typeof req.headers.authorization === 'string' && req.headers.authorization.length > 0;
      return res.status(401).json({
        success: false,
        error: 'Authentication required',
        message: malformed ? 'Invalid authorization header format' : 'Please provide a valid authorization token',
      });
    }

    try {
      req.identity = await resolveIdentity(credential);
      return next();
    } catch (error) {
      if (isChatError(error) && error.kind === 'unauthenticated') {
        return res.status(401).json({
          success: false,
          error: 'Invalid token',
          message: 'Invalid authentication credentials',
        });
      }

      console.error('Error resolving identity:', error);
      return res.status(500).json({
        success: false,
        error: 'Server error',
        message: 'An error occurred while verifying your authentication',
      });
    }
  };

// Middleware to check if user has admin privileges
export const requireAdmin = (req: Request, res: Response, next: NextFunction) => {
  if (!req.identity) {
    return res.status(401).json({
      success: false,
      error: 'Authentication required',
      message: 'Please log in to access this resource',
    });
  }

  if (req.identity.role !== 'admin') {
    return res.status(403).json({
      success: false,
      error: 'Admin access required',
      message: 'You need admin privileges to access this resource',
    });
  }

  next();
};
