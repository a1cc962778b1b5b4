/** Configuration file looked up by ConfigLoader */
export const CONFIG_FILE = 'tree-navigator.json';

/** Tree ids: prefix + nanoid, used to correlate log entries */
export const TREE_ID_PREFIX = 'tree-';
export const NANOID_LENGTH_TREE = 8;
