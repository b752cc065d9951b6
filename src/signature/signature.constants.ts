export const ESIGN_HTTP = Symbol("ESIGN_HTTP");

export const OAUTH_GRANT_TYPE = "urn:ietf:params:oauth:grant-type:jwt-bearer";
export const OAUTH_SCOPE = "signature impersonation";

// tokens are renewed this long before the provider expires them
export const TOKEN_RENEWAL_MARGIN_MS = 60_000;
