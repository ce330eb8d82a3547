export type LogLevelSetting = 'debug' | 'info' | 'warn' | 'error';

export interface Settings {
  allCompile: boolean;
  pythonCompile: boolean;
  experimental: boolean;
  pythonVenvAutoCreate: boolean;
  verbose: boolean;
  logLevel: LogLevelSetting;
  /** Freshness window of the remote catalogs, in milliseconds */
  fetchRemoteVersionsCache: number;
  /** Upper bound for version listing and background repository updates, in milliseconds */
  fetchRemoteVersionsTimeout: number;
  useVersionsHost: boolean;
  versionsHostUrl: string;
  pyenvRepo: string;
  pythonPatchUrl?: string | undefined;
  pythonPatchesDirectory?: string | undefined;
  defaultPackagesFile: string;
  dataDir: string;
  cacheDir: string;
}

export type SettingKey = keyof Settings;
