import { Request, Response } from 'express';
import { param } from 'express-validator';
import { LoadRepository } from '../services/loadRepository';
import { asyncHandler } from '../middleware/errorHandler';

export const getLoadValidation = [
  param('load_id')
    .isInt({ min: 1, max: Number.MAX_SAFE_INTEGER, allow_leading_zeroes: false })
    .withMessage('load_id must be a positive integer')
    .toInt(),
];

export const createLoadController = (repository: LoadRepository) => ({
  // Get a single load by its numeric id
  getLoadById: asyncHandler(async (req: Request, res: Response) => {
    const loadId = Number(req.params.load_id);
    const load = repository.getById(loadId);

    res.json(load);
  }),
});
