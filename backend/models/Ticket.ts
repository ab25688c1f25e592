import mongoose, { Schema, type InferSchemaType } from 'mongoose';
import { CreationMethods, SenderTypes, TicketPriorities, TicketStatus } from '../database/ticketStore.js';

export const attachmentSchema = new Schema(
  {
    filename: { type: String, required: true, trim: true, maxlength: 255 },
    contentType: { type: String, trim: true, default: 'application/octet-stream' },
    // Base64 body; large payloads are bounded by REQUEST_BODY_LIMIT.
    data: { type: String, required: true },
  },
  { _id: false }
);

const vehicleSchema = new Schema(
  {
    registration: { type: String, trim: true, uppercase: true },
    serviceDate: { type: String, trim: true },
    claimDate: { type: String, trim: true },
    typeOfClaim: { type: String, trim: true },
    technician: { type: String, trim: true },
    vhcLink: { type: String, trim: true },
    daysBetweenServiceClaim: { type: Number, min: 0 },
    advisoriesFollowed: { type: Boolean },
    withinWarranty: { type: Boolean },
    newFaultCodes: { type: Boolean },
    dpfLightOn: { type: Boolean },
    emlLightOn: { type: Boolean },
  },
  { _id: false }
);

const ticketSchema = new Schema(
  {
    ticketCode: { type: String, required: true, trim: true, uppercase: true, unique: true },

    // Open enumeration: automations may introduce their own statuses.
    status: { type: String, required: true, trim: true, default: TicketStatus.New, index: true },
    priority: { type: String, enum: TicketPriorities, default: 'Medium', index: true },
    classification: { type: String, trim: true },

    email: { type: String, trim: true },
    name: { type: String, trim: true },
    phone: { type: String, trim: true },

    // One email conversation maps to at most one ticket.
    threadId: { type: String, trim: true, unique: true, sparse: true },

    subject: { type: String, trim: true },
    body: { type: String },
    draftResponse: { type: String },
    assignedTo: { type: String, trim: true },
    vehicle: { type: vehicleSchema },
    attachments: { type: [attachmentSchema], default: [] },

    hasUnreadReply: { type: Boolean, default: false, index: true },
    lastReplyAt: { type: Date },
    lastReplyPreview: { type: String },
    lastReplySender: { type: String, enum: SenderTypes },

    creationMethod: { type: String, enum: CreationMethods, default: 'manual' },
    createdBy: { type: String, trim: true },
    referredBy: { type: String, trim: true },
    referredAt: { type: Date },
    closedBy: { type: String, trim: true },
    closedAt: { type: Date },
  },
  { timestamps: true }
);

ticketSchema.index({ email: 1, createdAt: -1 });
ticketSchema.index({ status: 1, createdAt: -1 });

export type TicketDoc = InferSchemaType<typeof ticketSchema>;
export const TicketModel = mongoose.model('Ticket', ticketSchema);
