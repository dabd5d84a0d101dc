import { body, param, query } from 'express-validator';
import { MessagePriority, MessageType } from '../../types/coordination';

const principalRule = (field: string) =>
  body(field)
    .exists()
    .withMessage(`${field} is required`)
    .isString()
    .withMessage(`${field} must be a string`)
    .trim()
    .isLength({ min: 1, max: 64 })
    .withMessage(`${field} must be between 1 and 64 characters`);

export const publishStatusValidation = [
  param('principal')
    .isString()
    .trim()
    .isLength({ min: 1, max: 64 })
    .withMessage('Principal must be between 1 and 64 characters'),
  body('tokensUsed')
    .exists()
    .withMessage('Tokens used is required')
    .isInt({ min: 0 })
    .withMessage('Tokens used must be a non-negative integer')
    .toInt(),
  body('healthScore')
    .exists()
    .withMessage('Health score is required')
    .isFloat({ min: 0, max: 1 })
    .withMessage('Health score must be between 0 and 1')
    .toFloat(),
  body('versionMarker')
    .exists()
    .withMessage('Version marker is required')
    .isString()
    .withMessage('Version marker must be a string')
    .isLength({ max: 128 })
    .withMessage('Version marker must be at most 128 characters'),
];

export const sendMessageValidation = [
  principalRule('from'),
  principalRule('to'),
  body('type')
    .isIn(Object.values(MessageType))
    .withMessage(`Type must be one of: ${Object.values(MessageType).join(', ')}`),
  body('priority')
    .optional()
    .isIn(Object.values(MessagePriority))
    .withMessage(`Priority must be one of: ${Object.values(MessagePriority).join(', ')}`),
  body('title')
    .isString()
    .withMessage('Title must be a string')
    .trim()
    .isLength({ min: 1, max: 200 })
    .withMessage('Title must be between 1 and 200 characters'),
  body('body').optional().isString().withMessage('Body must be a string'),
  body('metadata').optional().isObject().withMessage('Metadata must be an object'),
  body('ttlHours')
    .optional()
    .isFloat({ min: 0 })
    .withMessage('TTL hours must be 0 or greater')
    .toFloat(),
];

export const inboxValidation = [
  param('principal')
    .isString()
    .trim()
    .isLength({ min: 1, max: 64 })
    .withMessage('Principal must be between 1 and 64 characters'),
  query('limit')
    .optional()
    .isInt({ min: 1, max: 100 })
    .withMessage('Limit must be between 1 and 100')
    .toInt(),
];

export const markReadValidation = [
  param('messageId').isUUID(4).withMessage('Message ID must be a valid UUID'),
  principalRule('principal'),
];

export const triggersValidation = [
  query('principal')
    .isString()
    .trim()
    .isLength({ min: 1, max: 64 })
    .withMessage('Principal is required'),
  query('peer')
    .isString()
    .trim()
    .isLength({ min: 1, max: 64 })
    .withMessage('Peer is required'),
];
