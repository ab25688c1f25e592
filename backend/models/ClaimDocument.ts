import mongoose, { Schema, type InferSchemaType } from 'mongoose';

const claimDocumentSchema = new Schema(
  {
    // Weak back-reference, like replies.
    ticketCode: { type: String, required: true, trim: true, uppercase: true, index: true },
    fileName: { type: String, required: true, trim: true, maxlength: 255 },
    fileType: { type: String, trim: true, default: 'application/octet-stream' },
    fileSize: { type: Number, required: true, min: 0 },
    data: { type: String, required: true },
    description: { type: String, trim: true, maxlength: 2000 },
    uploadedBy: { type: String, trim: true },
    deletedAt: { type: Date, default: null },
  },
  { timestamps: { createdAt: 'uploadedAt', updatedAt: false } }
);

claimDocumentSchema.index({ ticketCode: 1, uploadedAt: 1 });

export type ClaimDocumentDoc = InferSchemaType<typeof claimDocumentSchema>;
export const ClaimDocumentModel = mongoose.model('ClaimDocument', claimDocumentSchema);
