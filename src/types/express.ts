import { Identity } from './entities';

// Extend Express Request interface to include the authenticated identity
declare global {
  namespace Express {
    interface Request {
      identity?: Identity;
    }
  }
}

export {};
