import type { AuthPrincipal } from "./types.js";
import type { RequestContext } from "../observability/requestContext.js";

declare global {
  namespace Express {
    interface Request {
      auth?: AuthPrincipal;
      context?: RequestContext;
    }
  }
}

export {};
