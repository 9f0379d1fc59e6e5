import type { AppServices } from '../../../services.js';
import type { AuthHandlers } from '../middleware/auth.middleware.js';

export interface RouteOptions {
  readonly services: AppServices;
  readonly auth: AuthHandlers;
}
