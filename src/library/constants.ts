// Data constants
export const DEFAULT_PRIMARY_KEY = 'IDpol';
export const SUPPORTED_RECORD_EXTENSIONS = ['.json', '.jsonl', '.ndjson', '.csv'];

// Config file names
export const CATEGORY_INDEX_FILE = 'category-index.json';
export const CONTINUOUS_BANDING_FILE = 'continuous-banding.json';
export const RATING_PLAN_FILE = 'rating.json';

// Transformation constants
export const DEFAULT_INDEX_SUFFIX = '_Index';
export const DEFAULT_BAND_SUFFIX = 'Band';

// Rating constants
export const DEFAULT_FACTOR_COLUMN = 'factor';
export const KEY_SEPARATOR = '|';

// Batch constants
export const DEFAULT_CHUNK_SIZE = 500;
export const DEFAULT_LOG_DIR = './pricer-logs';
