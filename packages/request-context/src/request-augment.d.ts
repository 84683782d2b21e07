// packages/request-context/src/request-augment.d.ts

import type { EndUserIdentity, HopIdentity } from "./types";

declare module "express-serve-static-core" {
  interface Request {
    /**
     * Hop identity resolved by the enforcement point for this request.
     */
    hop?: HopIdentity;

    /**
     * End user verified at the entry hop.
     */
    user?: EndUserIdentity;
  }
}
