import os from 'os';
import { Router, Request, Response } from 'express';

import { config } from '../config';

export interface EnvironmentInfo {
  name: string;
  version: string;
  environment: string;
  runtime: string;
  timestamp: string;
  hostName: string;
  osArchitecture: string;
  osPlatform: string;
  osVersion: string;
  processArchitecture: string;
}

export const getEnvironmentDetails = (): EnvironmentInfo => ({
  name: config.app.name,
  version: config.app.version,
  environment: config.nodeEnv,
  runtime: `Node.js ${process.version}`,
  timestamp: new Date().toISOString(),
  hostName: os.hostname(),
  osArchitecture: os.arch(),
  osPlatform: os.platform(),
  osVersion: os.release(),
  processArchitecture: process.arch,
});

const router = Router();

router.get('/info', (_req: Request, res: Response) => {
  res.json({ success: true, data: getEnvironmentDetails() });
});

router.get('/health', (_req: Request, res: Response) => {
  res.json({ success: true, data: { status: 'Healthy', timestamp: new Date().toISOString() } });
});

export default router;
