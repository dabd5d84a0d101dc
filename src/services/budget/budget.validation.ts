import { body, param, query } from 'express-validator';

const principalBody = () =>
  body('principal')
    .exists()
    .withMessage('Principal is required')
    .isString()
    .withMessage('Principal must be a string')
    .trim()
    .isLength({ min: 1, max: 64 })
    .withMessage('Principal must be between 1 and 64 characters');

const tokenAmount = (name: string, label: string) =>
  body(name)
    .exists()
    .withMessage(`${label} is required`)
    .isInt({ min: 0 })
    .withMessage(`${label} must be a non-negative integer`)
    .toInt();

const operationIdParam = param('operationId')
  .isString()
  .trim()
  .isLength({ min: 1, max: 128 })
  .withMessage('Operation ID must be between 1 and 128 characters');

export const checkAvailabilityValidation = [
  principalBody(),
  tokenAmount('estimatedTokens', 'Estimated tokens'),
];

export const reserveValidation = [
  principalBody(),
  body('operationId')
    .exists()
    .withMessage('Operation ID is required')
    .isString()
    .withMessage('Operation ID must be a string')
    .trim()
    .isLength({ min: 1, max: 128 })
    .withMessage('Operation ID must be between 1 and 128 characters'),
  tokenAmount('estimatedTokens', 'Estimated tokens'),
  body('metadata').optional().isObject().withMessage('Metadata must be an object'),
];

export const settleValidation = [
  operationIdParam,
  tokenAmount('actualTokens', 'Actual tokens'),
  body('metadata').optional().isObject().withMessage('Metadata must be an object'),
];

export const refundValidation = [
  operationIdParam,
  body('reason')
    .optional()
    .isString()
    .withMessage('Reason must be a string')
    .isLength({ max: 256 })
    .withMessage('Reason must be at most 256 characters'),
];

export const principalParamValidation = [
  param('principal')
    .isString()
    .trim()
    .isLength({ min: 1, max: 64 })
    .withMessage('Principal must be between 1 and 64 characters'),
];

export const statisticsValidation = [
  ...principalParamValidation,
  query('days')
    .optional()
    .isInt({ min: 1, max: 90 })
    .withMessage('Days must be between 1 and 90')
    .toInt(),
];
