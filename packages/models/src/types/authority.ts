/**
 * Directory realm segment of the identity endpoint.
 *
 * The shared realms map to fixed path segments (`common`, `organizations`,
 * `consumers`, `adfs`); a tenant carries its own id or domain name.
 */
export type Authority =
  | { readonly type: 'common' }
  | { readonly type: 'organizations' }
  | { readonly type: 'consumers' }
  | { readonly type: 'adfs' }
  | { readonly type: 'tenant'; readonly tenantId: string };

export const Authorities = {
  COMMON: { type: 'common' },
  ORGANIZATIONS: { type: 'organizations' },
  CONSUMERS: { type: 'consumers' },
  AZURE_DIRECTORY_FEDERATED_SERVICES: { type: 'adfs' },
  tenant: (tenantId: string): Authority => ({ type: 'tenant', tenantId }),
} as const satisfies Record<string, Authority | ((tenantId: string) => Authority)>;
