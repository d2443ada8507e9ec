import { createServer } from "http";
import { createApp } from "./app";
import { loadConfig, loadSiteCatalog } from "./config";

async function startServer() {
  const config = loadConfig();
  const sites = loadSiteCatalog(config.sitesPath);
  const app = createApp({ config, sites });
  const server = createServer(app);

  server.listen(config.port, () => {
    console.log(`[server] ${sites.length} reference sites, archive timezone ${config.timezone}`);
    console.log(`[server] Server running on http://localhost:${config.port}/`);
  });
}

startServer().catch((error) => {
  console.error("[server] Failed to start:", error);
  process.exitCode = 1;
});
