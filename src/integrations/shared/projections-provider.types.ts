/**
 * Provider-agnostic shapes for downloaded projection payloads
 */

/** Raw body of the response that was accepted, with where it came from. */
export interface RawProjectionsResponse {
  endpoint: string;
  url: string;
  status: number;
  /** null when the response carried no Content-Type header */
  contentType: string | null;
  body: string;
}

/** One candidate request in an ordered fallback list */
export interface ProviderEndpoint {
  name: string;
  url: string;
  /** Headers specific to this endpoint, merged over the provider's base set */
  headers: Record<string, string>;
}
