import mongoose, { Schema, type InferSchemaType } from 'mongoose';
import { SenderTypes } from '../database/ticketStore.js';
import { attachmentSchema } from './Ticket.js';

const replySchema = new Schema(
  {
    // Weak back-reference: deleting a ticket leaves its replies in place.
    ticketCode: { type: String, required: true, trim: true, uppercase: true, index: true },
    message: { type: String, required: true },
    senderName: { type: String, trim: true },
    senderEmail: { type: String, trim: true },
    senderType: { type: String, enum: SenderTypes, required: true },
    attachments: { type: [attachmentSchema], default: [] },
    deletedAt: { type: Date, default: null },
  },
  { timestamps: { createdAt: true, updatedAt: false } }
);

replySchema.index({ ticketCode: 1, createdAt: 1 });

export type ReplyDoc = InferSchemaType<typeof replySchema>;
export const ReplyModel = mongoose.model('Reply', replySchema);
