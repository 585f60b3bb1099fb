export interface StoredDocument {
  path: string;
  size: number;
  /** False when the destination already existed and was left untouched. */
  written: boolean;
}

export interface DocumentStorage {
  init(): Promise<void>;
  store(path: string, text: string): Promise<StoredDocument>;
  retrieve(path: string): Promise<string>;
  exists(path: string): Promise<boolean>;
}
