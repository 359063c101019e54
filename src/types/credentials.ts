/**
 * Credential source contracts.
 *
 * The pipeline never computes or parses credential material. It reads
 * these accessors once per credential operation and carries the result
 * downstream as an opaque value.
 */

/** Fields every credential source exposes. */
export interface CredentialSource {
  /** Provisioning service host name. */
  getHost(): string;
  /** Registration (device) identifier. */
  getRegistrationId(): string;
  /** ID scope of the provisioning service instance. */
  getScope(): string;
}

/** Credential source backed by a shared access signature. */
export interface SymmetricKeyCredentialSource extends CredentialSource {
  /** The current, not yet expired, SAS token. */
  getCurrentToken(): string;
}

/** Opaque client certificate material handed to the transport. */
export interface ClientCertificate {
  cert: string;
  key: string;
  passphrase?: string;
}

/** Credential source backed by an X.509 client certificate. */
export interface CertificateCredentialSource extends CredentialSource {
  getCertificate(): ClientCertificate;
}
