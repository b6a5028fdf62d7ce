/**
 * Hono application environment type.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */

import type { DisbursementService } from "../services/disbursement-service.js";
import type { AuthContext } from "./auth.js";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The service behind every route (set in createApp) */
    service: DisbursementService;

    /** Authentication context (set by auth middleware on privileged routes) */
    auth: AuthContext;

    /**
     * Identity passed to the domain as the caller. The key's identity
     * when one was presented, "anonymous" otherwise.
     */
    caller: string;
  };
}
