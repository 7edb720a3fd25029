import type { TsrfConfig } from './types.js';

export const CONFIG_FILE_NAME = '.tsrf.json';

export const DEFAULT_CONFIG: TsrfConfig = {
  version: 1,
  tsconfig: 'tsconfig.json',
  format: {
    indentSize: 2,
    tabSize: 2,
    convertTabsToSpaces: true,
    newLineCharacter: '\n',
    semicolons: 'ignore',
  },
  logLevel: 'warn',
};
