import path from "node:path";
import { promises as fsPromises } from "node:fs";
import { chromium, type Cookie, type Page, type Response } from "playwright";
import { AuthError, SessionError, describeError } from "./errors.js";
import { isRecord } from "./json.js";
import { debug, isDebug } from "./log.js";
import type { CredentialProvider, Session } from "./types.js";

export const HOUSEHOLD_URL = "https://www.amazon.com/parentdashboard/activities/household-summary";
export const AJAX_PREFIX = "/parentdashboard/ajax/";
export const CSRF_COOKIE = "ft-panda-csrf-token";

const LOGIN_TIMEOUT_MS = 120_000;
const FIELD_TIMEOUT_MS = 5_000;
const SETTLE_MS = 3_000;

export interface ChildIdentity {
  id: string;
  name: string;
}

export interface EstablishOptions {
  headless?: boolean;
  /** Where debug screenshots go. */
  debugDir?: string;
  loginTimeoutMs?: number;
}

/** CHILD members of a household-membership body; anything else yields nothing. */
export function extractChildren(body: unknown): ChildIdentity[] {
  if (!isRecord(body) || !Array.isArray(body.members)) return [];
  const members: unknown[] = body.members;
  const children: ChildIdentity[] = [];
  for (const member of members) {
    if (!isRecord(member)) continue;
    const { role, directedId, firstName } = member;
    if (role !== "CHILD" || typeof directedId !== "string" || !directedId) continue;
    children.push({ id: directedId, name: typeof firstName === "string" && firstName ? firstName : "Unknown" });
  }
  return children;
}

export function findCsrfToken(cookies: readonly Pick<Cookie, "name" | "value">[]): string | null {
  for (const cookie of cookies) {
    if (cookie.name === CSRF_COOKIE && cookie.value) return cookie.value;
  }
  return null;
}

export function buildSession(children: readonly ChildIdentity[], cookies: readonly Cookie[]): Session {
  const csrfToken = findCsrfToken(cookies);
  if (!csrfToken) {
    throw new SessionError(`Signed in, but no ${CSRF_COOKIE} cookie was set. The dashboard may have changed.`);
  }
  if (children.length === 0) {
    throw new SessionError("Signed in, but the household response listed no CHILD members.");
  }
  const childNames = new Map(children.map((child) => [child.id, child.name] as const));
  return Object.freeze({
    childIds: new Set(childNames.keys()),
    childNames,
    csrfToken,
    cookies: Object.freeze([...cookies])
  });
}

function isSignInUrl(url: string) {
  return url.includes("/ap/signin") || url.includes("/ap/challenge") || url.includes("/ap/mfa");
}

async function screenshot(page: Page, dir: string | undefined, name: string) {
  if (!isDebug() || !dir) return;
  await fsPromises.mkdir(dir, { recursive: true });
  const file = path.join(dir, name);
  await page.screenshot({ path: file, fullPage: true });
  console.log(`📸 Screenshot saved to ${file}`);
}

async function visible(page: Page, selector: string) {
  const locator = page.locator(selector).first();
  try {
    await locator.waitFor({ state: "visible", timeout: FIELD_TIMEOUT_MS });
    return locator;
  } catch {
    return null;
  }
}

async function assertNoAuthError(page: Page, step: string) {
  const box = page.locator("#auth-error-message-box, #auth-warning-message-box .a-alert-content").first();
  if (await box.isVisible().catch(() => false)) {
    const text = ((await box.textContent().catch(() => "")) ?? "").replace(/\s+/g, " ").trim();
    throw new AuthError(`Sign-in rejected after ${step}${text ? `: ${text}` : ""}`);
  }
}

async function signIn(page: Page, credentials: CredentialProvider, opts: EstablishOptions) {
  console.log("✏️ Filling sign-in form …");

  const emailField = await visible(page, "#ap_email");
  if (emailField) {
    await emailField.click();
    await emailField.fill(await credentials.getEmail());
    await page.waitForTimeout(500);
    await page.locator("#continue").first().click();
    await page.waitForLoadState("networkidle").catch(() => undefined);
    debug(`After email: ${page.url()}`);
    await assertNoAuthError(page, "email");
  }

  const passwordField = await visible(page, "#ap_password");
  if (passwordField) {
    await passwordField.click();
    // Typed rather than filled so the page's own validation fires.
    await passwordField.pressSequentially(await credentials.getPassword(), { delay: 20 });
    await page.waitForTimeout(500);
    await screenshot(page, opts.debugDir, "debug_pre_submit.png");
    await page.locator("#signInSubmit").click();
    await page.waitForLoadState("networkidle").catch(() => undefined);
    debug(`After password: ${page.url()}`);
    await screenshot(page, opts.debugDir, "debug_post_password.png");
    await assertNoAuthError(page, "password");
  }

  const otpField = await visible(page, "#auth-mfa-otpcode");
  if (otpField) {
    const otp = await credentials.getOtp();
    if (otp) {
      console.log("🔢 Filling one-time code …");
      await otpField.click();
      await otpField.pressSequentially(otp, { delay: 20 });
      await page.waitForTimeout(500);
      await page.locator("#auth-signin-button").click();
      await page.waitForLoadState("networkidle").catch(() => undefined);
      await assertNoAuthError(page, "one-time code");
    } else {
      console.log("🔢 One-time code requested; enter it in the browser window.");
    }
  }

  if (isSignInUrl(page.url())) {
    const timeout = opts.loginTimeoutMs ?? LOGIN_TIMEOUT_MS;
    console.log(`⏳ Waiting up to ${Math.round(timeout / 1000)}s for sign-in to complete …`);
    console.log("   Complete any verification in the browser window.");
    try {
      await page.waitForURL((url) => url.pathname.includes("parentdashboard") && !url.pathname.startsWith("/ap/"), {
        timeout
      });
    } catch (err) {
      await assertNoAuthError(page, "verification");
      throw new AuthError(`Sign-in did not complete within ${Math.round(timeout / 1000)}s`, { cause: err });
    }
  }
}

/**
 * Logs in through a real browser and harvests what the API calls need.
 * The household-membership response can land at any point of the login
 * flow, so the listener is attached before the first navigation.
 */
export async function establishSession(
  credentials: CredentialProvider,
  opts: EstablishOptions = {}
): Promise<Session> {
  const browser = await chromium.launch({ headless: opts.headless ?? false });
  try {
    const context = await browser.newContext({ viewport: { width: 1280, height: 900 } });
    const page = await context.newPage();

    const children = new Map<string, ChildIdentity>();
    const pending: Promise<void>[] = [];
    page.on("response", (response: Response) => {
      const url = response.url();
      if (!url.includes(AJAX_PREFIX)) return;
      if (!(response.headers()["content-type"] ?? "").includes("json")) return;
      debug(`Intercepted ${response.status()} ${url}`);
      pending.push(
        response
          .json()
          .then((body: unknown) => {
            for (const child of extractChildren(body)) children.set(child.id, child);
          })
          .catch((err: unknown) => debug(`Unreadable body from ${url}: ${describeError(err)}`))
      );
    });

    console.log("🔐 Navigating to the parent dashboard …");
    await page.goto(HOUSEHOLD_URL, { waitUntil: "networkidle" });

    if (isSignInUrl(page.url())) {
      console.log("🔑 Sign-in required …");
      await signIn(page, credentials, opts);
      await page.waitForLoadState("networkidle").catch(() => undefined);
    }

    console.log(`🏠 Landed on ${page.url()}`);
    await screenshot(page, opts.debugDir, "debug_landing.png");

    // Give late household calls a chance to fire, then let their bodies finish parsing.
    await page.waitForTimeout(SETTLE_MS);
    await Promise.all(pending);

    const session = buildSession([...children.values()], await context.cookies());
    const names = [...session.childNames.values()].join(", ");
    console.log(`👶 Found children: ${names}`);
    return session;
  } finally {
    await browser.close();
  }
}
