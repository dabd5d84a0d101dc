import mongoose, { Schema } from 'mongoose';

import { ProjectStatus } from '../types/coordination';

const projectStatusSchema = new Schema<ProjectStatus>(
  {
    principal: {
      type: String,
      required: true,
      unique: true,
    },
    versionMarker: {
      type: String,
      required: true,
    },
    tokensUsedToday: {
      type: Number,
      required: true,
      min: 0,
    },
    dailyLimit: {
      type: Number,
      required: true,
      min: 1,
    },
    healthScore: {
      type: Number,
      required: true,
      min: 0,
      max: 1,
    },
    budgetDay: {
      type: String,
      required: true,
    },
    lastUpdate: {
      type: Date,
      required: true,
    },
  },
  {
    versionKey: false,
  }
);

export const ProjectStatusModel = mongoose.model<ProjectStatus>(
  'ProjectStatus',
  projectStatusSchema,
  'project_status'
);
