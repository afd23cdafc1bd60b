// Shared shapes passed between the boundary adapter and the emulator core.

/** Attribute name → value. One value per name. */
export type AttributeMap = Record<string, string>;

export interface BatchItem {
  itemName: string;
  attributes: AttributeMap;
}

export interface SelectedItem {
  name: string;
  attributes: AttributeMap;
}

/** Flat, string-keyed request parameters as decoded from the query string or form body. */
export type RequestParams = Record<string, string>;

export type ActionName =
  | 'CreateDomain'
  | 'DeleteDomain'
  | 'ListDomains'
  | 'DeleteAttributes'
  | 'PutAttributes'
  | 'GetAttributes'
  | 'BatchPutAttributes'
  | 'Select';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface EmulatorSettings {
  port: number;
  bindAddress: string;
  dataDir: string;
  domainCap: number;
  logLevel: LogLevel;
}
