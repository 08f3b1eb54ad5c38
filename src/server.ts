import express from 'express';
import type { Controllers } from './controllers.js';

export const createServer = (controllers: Controllers): express.Application => {
  const app = express();

  app.get('/healthz', controllers.healthCheck);
  app.get('/status', controllers.getStatus);
  app.get('/budget', controllers.getBudget);
  app.get('/regions', controllers.listRegions);
  app.get('/regions/:region/snapshot', controllers.getSnapshot);
  app.get('/regions/:region/analytics', controllers.getAnalytics);
  app.get('/regions/:region/flights.csv', controllers.getFlightsCsv);
  app.post('/regions/:region/rebuild', controllers.rebuildSnapshot);
  app.get('/airports/:airport/arrivals', controllers.getArrivals);
  app.get('/airports/:airport/departures', controllers.getDepartures);

  return app;
};
