import dotenv from "dotenv";
import { Server } from "http";
import { createApp, listen } from "./app";
import { createGeoService, GeoService } from "./bootstrap";
import { loadConfig } from "./config";

// Load environment variables from .env
dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig();

  console.log("Creating GeoServer, this can take a while");
  const service = await createGeoService(config);

  if (config.allowOrigin) {
    console.log(`Access-Control-Allow-Origin set to: ${config.allowOrigin}`);
  }

  const app = createApp(service.server, { allowOrigin: config.allowOrigin });

  // Start the server
  const httpServer = await listen(app, config.port).catch(async (err) => {
    await service.server.stop();
    throw err;
  });
  console.log(`Server is running on port ${config.port}`);
  console.log(`API endpoints:`);
  console.log(`- GET http://localhost:${config.port}/lookup/`);
  console.log(`- GET http://localhost:${config.port}/lookup/{ip_address}`);
  console.log(`- GET http://localhost:${config.port}/health`);
  service.refresher?.start();

  // Listen for termination signals to close connections
  const onSignal = () => {
    shutdown(httpServer, service).then(
      () => process.exit(0),
      (err) => {
        console.error("Error during shutdown:", err);
        process.exit(1);
      }
    );
  };
  process.once("SIGTERM", onSignal);
  process.once("SIGINT", onSignal);
}

// Clean shutdown function
async function shutdown(httpServer: Server, service: GeoService): Promise<void> {
  console.log("Shutting down gracefully...");

  await new Promise<void>((resolve, reject) => {
    httpServer.close((err) => (err ? reject(err) : resolve()));
  });
  await service.refresher?.stop();
  await service.server.stop();
  console.log("Geo server stopped");
}

main().catch((err) => {
  console.error("Unable to create geoserve server:", err);
  process.exit(1);
});
