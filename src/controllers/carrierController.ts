import { Request, Response } from 'express';
import { query } from 'express-validator';
import { CarrierValidator, normalizeMcNumber } from '../services/carrierValidator';
import { asyncHandler, ValidationError } from '../middleware/errorHandler';

export const validateCarrierValidation = [
  query('mc_number')
    .exists()
    .withMessage('mc_number is required')
    .bail()
    .custom((value: unknown) => typeof value === 'string')
    .withMessage('mc_number must be a single value')
    .bail()
    .custom((value: string) => value.trim() !== '')
    .withMessage('mc_number is required')
    .bail()
    .custom((value: string) => normalizeMcNumber(value) !== '')
    .withMessage('mc_number must include the carrier number'),
];

export const createCarrierController = (validator: CarrierValidator) => ({
  // Validate an MC number against the FMCSA registry. Always 200; validity is in the body.
  validateCarrier: asyncHandler(async (req: Request, res: Response) => {
    const mcNumber = req.query.mc_number;

    if (typeof mcNumber !== 'string') {
      throw new ValidationError([{ field: 'mc_number', message: 'mc_number must be a single value' }]);
    }

    const result = await validator.validate(mcNumber);

    res.json(result);
  }),
});
