import type { AuthContext } from "../auth/credentialService";

declare module "express-serve-static-core" {
  interface Request {
    auth?: AuthContext;
  }
}
