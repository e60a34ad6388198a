import { Router } from 'express';
import { createCarrierController, validateCarrierValidation } from '../controllers/carrierController';
import { CarrierValidator } from '../services/carrierValidator';
import validate from '../middleware/validate';

export const createCarrierRoutes = (validator: CarrierValidator): Router => {
  const router = Router();
  const controller = createCarrierController(validator);

  router.get('/validate', validate(validateCarrierValidation), controller.validateCarrier);

  return router;
};

export default createCarrierRoutes;
