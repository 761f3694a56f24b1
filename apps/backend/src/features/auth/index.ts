export { JwtCredentialVerifier, extractBearerToken } from "./credential-verifier"
export type { CredentialVerifier } from "./credential-verifier"
