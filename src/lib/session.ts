import { AuthRequiredError } from "./errors";
import type { SignedInUser } from "./types";

/** Source of the signed-in user; only `uid` and `email` are read. */
export interface IdentityProvider {
  currentUser(): SignedInUser | null;
}

export function requireUser(identity: IdentityProvider, operation: string): SignedInUser {
  const user = identity.currentUser();
  if (!user) {
    console.warn(`[Daydreams] "${operation}" attempted without a signed-in user`);
    throw new AuthRequiredError(operation);
  }
  return user;
}

/** Identity that can be switched by hand, for scripts and tests. */
export class StaticIdentityProvider implements IdentityProvider {
  private user: SignedInUser | null;

  constructor(user: SignedInUser | null = null) {
    this.user = user;
  }

  currentUser(): SignedInUser | null {
    return this.user;
  }

  signIn(user: SignedInUser) {
    this.user = user;
  }

  signOut() {
    this.user = null;
  }
}
