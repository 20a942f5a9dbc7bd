/**
 * Minimal cookie jar for a single panel host
 *
 * Tracks name/value pairs from Set-Cookie headers and renders them back as a
 * Cookie header. Domain and path attributes are ignored: every request of a
 * run goes to the same origin.
 */
export class CookieJar {
  private readonly cookies = new Map<string, string>();

  /**
   * Absorb every Set-Cookie header of a response
   */
  storeFrom(headers: Headers): void {
    for (const line of headers.getSetCookie()) {
      this.storeLine(line);
    }
  }

  /**
   * Absorb one Set-Cookie line ("name=value; Path=/; HttpOnly")
   */
  storeLine(line: string): void {
    const [pair, ...attributes] = line.split(";");
    const separator = pair.indexOf("=");
    if (separator <= 0) {
      return;
    }

    const name = pair.slice(0, separator).trim();
    const value = pair.slice(separator + 1).trim();

    if (value === "" || isExpired(attributes)) {
      this.cookies.delete(name);
      return;
    }
    this.cookies.set(name, value);
  }

  get(name: string): string | undefined {
    return this.cookies.get(name);
  }

  get size(): number {
    return this.cookies.size;
  }

  /**
   * Cookie request header value ("" when empty)
   */
  toHeader(): string {
    return [...this.cookies.entries()]
      .map(([name, value]) => `${name}=${value}`)
      .join("; ");
  }

  clear(): void {
    this.cookies.clear();
  }
}

function isExpired(attributes: string[]): boolean {
  for (const raw of attributes) {
    const [key, ...rest] = raw.trim().split("=");
    const value = rest.join("=").trim();
    const attribute = key.toLowerCase();

    if (attribute === "max-age" && Number(value) <= 0) {
      return true;
    }
    if (attribute === "expires") {
      const expiresAt = Date.parse(value);
      if (!Number.isNaN(expiresAt) && expiresAt <= Date.now()) {
        return true;
      }
    }
  }
  return false;
}
