import mongoose from "mongoose";

export interface IUser {
  contact: string;
  password: string;
  refreshToken: string[];
}

const userSchema = new mongoose.Schema<IUser>(
  {
    contact: {
      type: String,
      required: true,
      unique: true,
    },
    password: {
      type: String,
      required: true,
    },
    refreshToken: {
      type: [String],
      default: [],
    },
  },
  { timestamps: true }
);

const userModel = mongoose.model<IUser>("users", userSchema);

export default userModel;
