// server/src/routes/index.ts


import { Router } from 'express';
import health from './health.js';
import teams from './teams.js';
import simulate from './simulate.js';

const api = Router();
api.use(health);
api.use(teams);
api.use(simulate);

export default api;
