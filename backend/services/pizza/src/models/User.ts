// backend/services/pizza/src/models/User.ts
import { Schema, model } from "mongoose";

export interface UserDoc {
  username: string;
  email: string;
  passwordHash: string;
  permissionLevel: number;
  dateCreated: Date;
  dateLastUpdated: Date;
}

const UserSchema = new Schema<UserDoc>(
  {
    username: { type: String, required: true, trim: true },
    email: { type: String, required: true, lowercase: true, trim: true },
    passwordHash: { type: String, required: true },
    permissionLevel: { type: Number, required: true, enum: [0, 1], default: 0 },
  },
  {
    collection: "users",
    strict: true,
    versionKey: false,
    timestamps: { createdAt: "dateCreated", updatedAt: "dateLastUpdated" },
  }
);

// Uniqueness lives in the store so concurrent signups cannot both win.
UserSchema.index({ username: 1 }, { unique: true, name: "uniq_username" });
UserSchema.index({ email: 1 }, { unique: true, name: "uniq_email" });

export const UserModel = model<UserDoc>("User", UserSchema);
