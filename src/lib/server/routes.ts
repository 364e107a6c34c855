import type { Router } from 'express';
import type { Configuration } from '../config/configuration.js';
import { getPackageInfo } from '../utils/user-agent.js';

/** Attaches one group of handlers to the `/qvs/v1` router. */
export type RouteRegistrar = (router: Router, config: Configuration) => void;

export const versionRoutes: RouteRegistrar = (router) => {
  const { name, version } = getPackageInfo();
  router.get('/version', (_req, res) => {
    res.json({ name, version });
  });
};
