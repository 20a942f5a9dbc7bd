/**
 * Chromium launch arguments, grouped by purpose
 */

export const BROWSER_ARGS = {
  /** Keep a long-lived headless panel session small */
  MEMORY_OPTIMIZED: [
    "--disable-dev-shm-usage",
    "--disable-gpu",
    "--disable-software-rasterizer",
    "--disable-extensions",
    "--disable-background-networking",
    "--no-first-run",
  ],

  /** Hide navigator automation flags from the panel's login page */
  STEALTH: ["--disable-blink-features=AutomationControlled"],

  /** Required inside containers */
  SANDBOX: ["--no-sandbox", "--disable-setuid-sandbox"],

  get DEFAULT(): string[] {
    return [...this.SANDBOX, ...this.MEMORY_OPTIMIZED, ...this.STEALTH];
  },
} as const;
