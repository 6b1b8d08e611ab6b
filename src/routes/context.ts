import { AuthMiddleware } from '../middleware/auth';
import { AppServices } from '../services';

// Everything a router needs, passed in at app construction
export interface RouteContext {
  services: AppServices;
  auth: AuthMiddleware;
}
