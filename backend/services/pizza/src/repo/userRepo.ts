// backend/services/pizza/src/repo/userRepo.ts
import type { ClientSession } from "mongoose";
import { UserModel } from "../models/User";
import { userFromDb, userRecordFromDb } from "../mappers/db.mapper";
import { rethrowDuplicate } from "@shared/db/dupeKeyError";
import type { UserRepo } from "./store";

export function createUserRepo(session: ClientSession): UserRepo {
  return {
    async findByUsername(username) {
      const doc = await UserModel.findOne({ username }).session(session).exec();
      return doc ? userRecordFromDb(doc) : null;
    },

    async findByEmail(email) {
      const doc = await UserModel.findOne({ email: email.toLowerCase() })
        .session(session)
        .exec();
      return doc ? userRecordFromDb(doc) : null;
    },

    async create(input) {
      try {
        const saved = await new UserModel(input).save({ session });
        return userFromDb(saved);
      } catch (err) {
        return rethrowDuplicate(err);
      }
    },
  };
}
