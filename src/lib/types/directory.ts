/**
 * ACME directory object
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.1.1
 */
export interface AcmeDirectory {
  newNonce: string;
  newAccount: string;
  newOrder: string;
  revokeCert?: string;
  keyChange?: string;
  meta?: {
    termsOfService?: string;
    website?: string;
    caaIdentities?: string[];
    externalAccountRequired?: boolean;
  };
}
