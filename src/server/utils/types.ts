/**
 * Type definitions for the cfg language server settings
 */

import { DEFAULT_CONFIG, DEFAULT_SPECIAL_ALIGN_KEYS } from './constants';

/**
 * Configuration settings under the `cfgfmt` section
 */
export interface Settings {
  cfgfmt: {
    formatter: {
      enabled: boolean;
      alignMode: string;
      tabWidth: number;
      keyCap: number;
      commentCap: number;
      echoAlignTables: boolean;
      specialAlignKeys: string[];
    };
    logLevel: string;
    verboseLogging: boolean;
  };
}

/**
 * Default settings
 */
export const defaultSettings: Settings = {
  cfgfmt: {
    formatter: {
      enabled: true,
      alignMode: DEFAULT_CONFIG.ALIGN_MODE,
      tabWidth: DEFAULT_CONFIG.TAB_WIDTH,
      keyCap: DEFAULT_CONFIG.KEY_CAP,
      commentCap: DEFAULT_CONFIG.COMMENT_CAP,
      echoAlignTables: DEFAULT_CONFIG.ECHO_ALIGN_TABLES,
      specialAlignKeys: Array.from(DEFAULT_SPECIAL_ALIGN_KEYS)
    },
    logLevel: 'info',
    verboseLogging: false
  }
};
