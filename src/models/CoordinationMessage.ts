import mongoose, { Schema } from 'mongoose';

import { CoordinationMessage, MessagePriority, MessageType } from '../types/coordination';

const coordinationMessageSchema = new Schema<CoordinationMessage>(
  {
    messageId: {
      type: String,
      required: true,
      unique: true,
    },
    fromPrincipal: {
      type: String,
      required: true,
    },
    toPrincipal: {
      type: String,
      required: true,
    },
    type: {
      type: String,
      required: true,
      enum: Object.values(MessageType),
    },
    priority: {
      type: String,
      required: true,
      enum: Object.values(MessagePriority),
      default: MessagePriority.MEDIUM,
    },
    title: {
      type: String,
      required: true,
      trim: true,
    },
    body: {
      type: String,
      default: '',
    },
    metadata: {
      type: Schema.Types.Mixed,
      default: {},
    },
    createdAt: {
      type: Date,
      required: true,
    },
    expiresAt: {
      type: Date,
      default: null,
    },
    read: {
      type: Boolean,
      required: true,
      default: false,
    },
  },
  {
    versionKey: false,
  }
);

// Inbox reads: unread messages for a principal, newest first
coordinationMessageSchema.index({ toPrincipal: 1, read: 1, createdAt: -1 });

export const CoordinationMessageModel = mongoose.model<CoordinationMessage>(
  'CoordinationMessage',
  coordinationMessageSchema,
  'coordination_messages'
);
