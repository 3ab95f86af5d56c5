/**
 * National and public clouds, each with its own sign-in host
 */
export const CloudInstances = {
  AZURE_PUBLIC: 'AzurePublic',
  AZURE_CHINA: 'AzureChina',
  AZURE_GERMANY: 'AzureGermany',
  AZURE_US_GOVERNMENT: 'AzureUsGovernment',
} as const;

export type CloudInstance = (typeof CloudInstances)[keyof typeof CloudInstances];
