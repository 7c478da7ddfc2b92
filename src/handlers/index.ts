import type { DispatchRouter } from '../dispatch-router.js';
import { registerPingHandlers } from './ping.js';

export function registerBuiltinHandlers(router: DispatchRouter): DispatchRouter {
  registerPingHandlers(router);
  return router;
}
