import { Request, Response, NextFunction } from 'express';
import { validationResult, ValidationChain } from 'express-validator';
import { ValidationError } from './errorHandler';

// Validation middleware that runs validators and forwards failures to the error handler.
// Path-shape failures use 422, everything else the usual 400.
export const validate = (validations: ValidationChain[], statusCode: number = 400) => {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    await Promise.all(validations.map((validation) => validation.run(req)));

    const errors = validationResult(req);

    if (errors.isEmpty()) {
      next();
      return;
    }

    const formattedErrors = errors.array().map((error) => ({
      field: 'path' in error ? error.path : 'unknown',
      message: String(error.msg),
    }));

    next(new ValidationError(formattedErrors, statusCode));
  };
};

export default validate;
