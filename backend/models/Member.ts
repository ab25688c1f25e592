import mongoose, { Schema, type InferSchemaType } from 'mongoose';
import { MemberRoles, MemberStatuses } from '../database/ticketStore.js';

const memberSchema = new Schema(
  {
    name: { type: String, required: true, trim: true, minlength: 2, maxlength: 120 },
    email: { type: String, required: true, trim: true, lowercase: true, unique: true },

    // Never store plaintext passwords
    passwordHash: { type: String, required: true },

    role: { type: String, enum: MemberRoles, default: 'agent', index: true },
    status: { type: String, enum: MemberStatuses, default: 'active', index: true },
    lastLoginAt: { type: Date },
  },
  { timestamps: true }
);

export type MemberDoc = InferSchemaType<typeof memberSchema>;
export const MemberModel = mongoose.model('Member', memberSchema);
