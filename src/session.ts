import fs from "node:fs";
import path from "node:path";
import { differenceInHours, isValid, parseISO } from "date-fns";
import { z } from "zod";
import { describeError } from "./errors.js";

const cookieSchema = z.object({
  name: z.string(),
  value: z.string(),
  domain: z.string(),
  path: z.string(),
  expires: z.number(),
  httpOnly: z.boolean(),
  secure: z.boolean(),
  sameSite: z.enum(["Strict", "Lax", "None"])
});

const storageStateSchema = z.object({
  cookies: z.array(cookieSchema),
  origins: z.array(
    z.object({
      origin: z.string(),
      localStorage: z.array(z.object({ name: z.string(), value: z.string() }))
    })
  )
});

const sessionSchema = z.object({
  credentials: storageStateSchema,
  capturedAt: z.string().datetime(),
  validatedAt: z.string().datetime()
});

/** Playwright storage state: cookies plus per-origin localStorage. Opaque to everything but the browser. */
export type StorageState = z.infer<typeof storageStateSchema>;

export type Session = Readonly<z.infer<typeof sessionSchema>>;

export interface Authenticator {
  /** Drives the SSO flow until the site shows an authenticated landing page. */
  login(): Promise<Session>;
  /** Lightweight probe: authenticated marker present, no redirect to login. */
  isValid(session: Session): Promise<boolean>;
}

export function createSession(credentials: StorageState, at: Date = new Date()): Session {
  const stamp = at.toISOString();
  return { credentials, capturedAt: stamp, validatedAt: stamp };
}

export class SessionStore {
  constructor(readonly filePath: string) {}

  load(): Session | null {
    if (!fs.existsSync(this.filePath)) return null;

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, "utf8"));
    } catch (err) {
      console.warn(`⚠️  Ignoring unreadable session file ${this.filePath}: ${describeError(err)}`);
      return null;
    }

    const parsed = sessionSchema.safeParse(raw);
    if (!parsed.success) {
      console.warn(`⚠️  Ignoring malformed session file ${this.filePath}`);
      return null;
    }
    return parsed.data;
  }

  save(session: Session): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.partial`;
    fs.writeFileSync(tempPath, JSON.stringify(session, null, 2), { encoding: "utf8", mode: 0o600 });
    fs.renameSync(tempPath, this.filePath);
  }

  clear(): void {
    fs.rmSync(this.filePath, { force: true });
  }
}

export function isStale(session: Session, maxAgeHours: number, now: Date = new Date()): boolean {
  const captured = parseISO(session.capturedAt);
  if (!isValid(captured)) return true;
  return differenceInHours(now, captured) >= maxAgeHours;
}

/**
 * Loads the saved session and returns it once confirmed live; otherwise logs in
 * and persists the replacement. A failed login surfaces as AuthenticationError.
 */
export async function ensureSession({
  store,
  authenticator,
  maxAgeHours,
  now = () => new Date()
}: {
  store: SessionStore;
  authenticator: Authenticator;
  maxAgeHours: number;
  now?: () => Date;
}): Promise<Session> {
  const existing = store.load();

  if (existing && isStale(existing, maxAgeHours, now())) {
    console.log(`🕒 Saved session captured at ${existing.capturedAt} is older than ${maxAgeHours}h; logging in again.`);
  } else if (existing) {
    if (await authenticator.isValid(existing)) {
      const confirmed: Session = { ...existing, validatedAt: now().toISOString() };
      store.save(confirmed);
      console.log("🔐 Saved session is still valid.");
      return confirmed;
    }
    console.warn("⚠️  Saved session was rejected by the site; logging in again.");
  } else {
    console.log("🔐 No saved session; logging in.");
  }

  const fresh = await authenticator.login();
  store.save(fresh);
  console.log(`🔑 Session saved → ${store.filePath}`);
  return fresh;
}
