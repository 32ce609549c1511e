// packages/identity-core/src/keycloak.ts

function trimSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

export function keycloakIssuer(baseUrl: string, realm: string): string {
  return `${trimSlash(baseUrl)}/realms/${encodeURIComponent(realm)}`;
}

export function keycloakJwksUri(baseUrl: string, realm: string): string {
  return `${keycloakIssuer(baseUrl, realm)}/protocol/openid-connect/certs`;
}
