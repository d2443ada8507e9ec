import { assertCoordinate, nearestSite } from '../archive/location';
import { loadSiteCatalog, loadConfig } from '../server/config';

// Usage: npm run nearest -- <lat> <lon>
const [latArg, lonArg] = process.argv.slice(2);
const config = loadConfig();
const lat = latArg !== undefined ? Number(latArg) : config.defaultPoint.latitude;
const lon = lonArg !== undefined ? Number(lonArg) : config.defaultPoint.longitude;

const sites = loadSiteCatalog(config.sitesPath);
const { site, distanceKm } = nearestSite(assertCoordinate({ latitude: lat, longitude: lon }), sites);

console.log(`Input: ${lat}, ${lon}`);
console.log(`Nearest site: ${site.name} (${distanceKm.toFixed(1)} km)`);
