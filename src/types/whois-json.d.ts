declare module 'whois-json' {
  interface WhoisOptions {
    server?: string | { host: string; port?: number };
    follow?: number;
    timeout?: number;
    verbose?: boolean;
  }

  /** Record keys are camel-cased WHOIS labels, e.g. "Registry Expiry Date" -> registryExpiryDate */
  type WhoisRecord = Record<string, unknown>;

  function whois(
    domain: string,
    options?: WhoisOptions
  ): Promise<WhoisRecord | Array<{ server?: string; data: WhoisRecord }>>;

  export = whois;
}
