import { Router } from 'express';
import { createLoadController, getLoadValidation } from '../controllers/loadController';
import { LoadRepository } from '../services/loadRepository';
import validate from '../middleware/validate';

export const createLoadRoutes = (repository: LoadRepository): Router => {
  const router = Router();
  const controller = createLoadController(repository);

  // Non-integer ids are a request-shape problem, hence 422
  router.get('/:load_id', validate(getLoadValidation, 422), controller.getLoadById);

  return router;
};

export default createLoadRoutes;
