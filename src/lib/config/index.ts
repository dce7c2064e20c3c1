export { CONFIG_SEARCH_PLACES, ConfigLoader, DEFAULTS } from './config-loader.js';
