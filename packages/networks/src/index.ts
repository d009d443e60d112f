export { NetworkCatalog, parseNetworkConfig } from './catalog.js';
