import mongoose, { Document, Schema } from 'mongoose';

/** Dashboard pages a role can be granted. */
export const PAGES = [
  'Dashboard',
  'Segmentation_Analysis',
  'Predictive_Analytics',
  'Campaign_Takeaways',
  'Live_Benchmarking',
  'Creative_Analysis',
  'Budget_Pacing',
  'Persona_Intelligence',
  'AB_Testing',
  'Export',
  'Upload_Data',
  'Admin',
] as const;

export type PageName = (typeof PAGES)[number];

export interface IRolePermission extends Document {
  _id: mongoose.Types.ObjectId;
  roleId: mongoose.Types.ObjectId;
  pageName: PageName;
  createdAt: Date;
  updatedAt: Date;
}

const RolePermissionSchema = new Schema<IRolePermission>(
  {
    roleId: {
      type: Schema.Types.ObjectId,
      ref: 'Role',
      required: true,
    },
    pageName: {
      type: String,
      enum: PAGES,
      required: true,
    },
  },
  {
    timestamps: true,
  }
);

// Compound unique index to prevent duplicate grants
RolePermissionSchema.index({ roleId: 1, pageName: 1 }, { unique: true });

export const RolePermission = mongoose.model<IRolePermission>(
  'RolePermission',
  RolePermissionSchema
);
