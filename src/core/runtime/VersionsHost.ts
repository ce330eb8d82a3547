import { Settings } from '../../types/Config';
import { HttpClient } from '../../utils/HttpClient';

/**
 * Ready-made version list published by the versions host, one version per line.
 * Resolves to null when the host is disabled in settings.
 */
export async function fetchVersionsFromHost(
  tool: string,
  settings: Settings
): Promise<string[] | null> {
  if (!settings.useVersionsHost) {
    return null;
  }

  const body = await HttpClient.getText(`${settings.versionsHostUrl.replace(/\/+$/, '')}/${tool}`);
  const versions = body
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0);

  return versions.length > 0 ? versions : null;
}
