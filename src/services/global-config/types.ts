/** A row of the global_configuration table. */
export interface GlobalSetting {
  key: string;
  value: string;
  isEncrypted: boolean;
}

export interface GlobalConfigStore {
  get(key: string): Promise<GlobalSetting | null>;
  set(key: string, value: string, isEncrypted: boolean): Promise<void>;
}
