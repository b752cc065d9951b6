export const EXTERNAL_HTTP = Symbol("EXTERNAL_HTTP");
