import express, { Express, NextFunction, Request, Response } from 'express';
import bodyParser from 'body-parser';
import jwt from 'jsonwebtoken';
import { ProjectorConfig, loadConfig } from './utils/config/config';
import { InputValidationError, NotFoundError } from './utils/validation/errors';
import { err } from './utils/logger';
import {
  getProjection,
  getProjectionCsv,
  getProjectionReport,
  getProjectionSummary,
} from './api/projection/projection';
import {
  runMonteCarlo,
  startSimulation,
  getAllSimulations,
  getSimulationStatus,
  getSimulationOutcome,
} from './api/monteCarlo/monteCarlo';
import { getSensitivity, getSavingRateSweep } from './api/sensitivity/sensitivity';
import { getSalaryUpgrades, getSavingsRates } from './api/schedules/schedules';

const isTokenValid = (secret: string, token?: string): boolean => {
  if (!token) {
    return false;
  }
  try {
    jwt.verify(token, secret);
    return true;
  } catch {
    return false;
  }
};

/**
 * Rejects requests without a valid token. Open when no secret is configured.
 */
const createVerifyToken = (secret: string) => (req: Request, res: Response, next: NextFunction) => {
  if (!secret) {
    next();
    return;
  }
  if (!isTokenValid(secret, req.headers.authorization)) {
    res.status(401).json({ message: 'Invalid token' });
    return;
  }
  next();
};

function sendError(res: Response, error: unknown): void {
  if (error instanceof InputValidationError) {
    res.status(400).json({ error: error.message, field: error.field });
    return;
  }
  if (error instanceof NotFoundError) {
    res.status(404).json({ error: error.message });
    return;
  }
  err('Request failed', error);
  res.status(500).json({ error: error instanceof Error ? error.message : 'Unknown error' });
}

export function createApp(config: ProjectorConfig = loadConfig()): Express {
  const app: Express = express();
  const verifyToken = createVerifyToken(config.jwtSecret);

  // Middleware
  app.use(express.json());
  app.use(bodyParser.text({ type: 'text/plain' }));
  app.use(bodyParser.urlencoded({ extended: true }));

  // Projection routes
  app.post('/api/projection', verifyToken, (req: Request, res: Response) => {
    try {
      res.json(getProjection(req));
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post('/api/projection/csv', verifyToken, async (req: Request, res: Response) => {
    try {
      res.type('text/csv').send(await getProjectionCsv(req));
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post('/api/projection/report', verifyToken, (req: Request, res: Response) => {
    try {
      res.type('text/plain').send(getProjectionReport(req));
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post('/api/projection/summary', verifyToken, (req: Request, res: Response) => {
    try {
      res.json(getProjectionSummary(req));
    } catch (error) {
      sendError(res, error);
    }
  });

  // Monte Carlo routes
  app.post('/api/monte_carlo', verifyToken, (req: Request, res: Response) => {
    try {
      res.json(runMonteCarlo(req));
    } catch (error) {
      sendError(res, error);
    }
  });

  app
    .route('/api/monte_carlo/simulations')
    .post(verifyToken, (req: Request, res: Response) => {
      try {
        res.json(startSimulation(req));
      } catch (error) {
        sendError(res, error);
      }
    })
    .get(verifyToken, (req: Request, res: Response) => {
      try {
        res.json(getAllSimulations(req));
      } catch (error) {
        sendError(res, error);
      }
    });

  app.get('/api/monte_carlo/simulations/:id/status', verifyToken, (req: Request, res: Response) => {
    try {
      res.json(getSimulationStatus(req));
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get('/api/monte_carlo/simulations/:id/result', verifyToken, (req: Request, res: Response) => {
    try {
      res.json(getSimulationOutcome(req));
    } catch (error) {
      sendError(res, error);
    }
  });

  // Sensitivity routes
  app.post('/api/sensitivity', verifyToken, (req: Request, res: Response) => {
    try {
      res.json(getSensitivity(req));
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post('/api/sensitivity/saving_rate_sweep', verifyToken, (req: Request, res: Response) => {
    try {
      res.json(getSavingRateSweep(req));
    } catch (error) {
      sendError(res, error);
    }
  });

  // Schedule routes
  app.post('/api/schedules/salary_upgrades', verifyToken, (req: Request, res: Response) => {
    try {
      res.json(getSalaryUpgrades(req));
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post('/api/schedules/savings_rates', verifyToken, (req: Request, res: Response) => {
    try {
      res.json(getSavingsRates(req));
    } catch (error) {
      sendError(res, error);
    }
  });

  return app;
}
