export const SOURCE_TOKEN_HEADER = 'X-Yotpo-Token';

export function getSourceAuthHeaders(accessToken: string): Record<string, string> {
  return {
    [SOURCE_TOKEN_HEADER]: accessToken,
  };
}

export function getIngestAuthHeaders(apiKey: string): Record<string, string> {
  return {
    'Authorization': `TD1 ${apiKey}`,
  };
}
