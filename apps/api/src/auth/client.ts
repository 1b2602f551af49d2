import { auth } from "./auth";

function readCookie(headers: unknown) {
  if (headers instanceof Headers) {
    return headers.get("cookie");
  }

  if (typeof headers === "object" && headers !== null) {
    const record = headers as Record<string, unknown>;
    const cookie = record.cookie;
    if (typeof cookie === "string") return cookie;
  }

  return null;
}

export type AuthSessionContext = {
  session: {
    id: string;
    userId: string;
    expiresAt: Date;
  };
  user: {
    id: string;
    name: string;
    email: string;
  };
};

/** Resolves the signed-in user behind a request's cookie; null when anonymous. */
export type HostIdentityResolver = (headers: unknown) => Promise<string | null>;

export async function readSessionFromHeaders(headers: unknown): Promise<AuthSessionContext | null> {
  const cookieHeader = readCookie(headers);
  if (!cookieHeader) return null;

  const result = await auth.api.getSession({
    headers: new Headers({
      cookie: cookieHeader,
    }),
  });
  if (!result?.session || !result.user) return null;

  return {
    session: {
      id: result.session.id,
      userId: result.session.userId,
      expiresAt: result.session.expiresAt,
    },
    user: {
      id: result.user.id,
      name: result.user.name,
      email: result.user.email,
    },
  };
}

export const readHostUserId: HostIdentityResolver = async (headers) => {
  const context = await readSessionFromHeaders(headers);
  return context?.user.id ?? null;
};
