import { mysqlTable, timestamp, varchar } from "drizzle-orm/mysql-core";

export const accounts = mysqlTable("accounts", {
  usernameKey: varchar("username_key", { length: 64 }).primaryKey(),
  username: varchar("username", { length: 64 }).notNull(),
  passwordHash: varchar("password_hash", { length: 128 }).notNull(),
  passwordSalt: varchar("password_salt", { length: 64 }).notNull(),
  securityQuestionId: varchar("security_question_id", {
    length: 64,
  }).notNull(),
  securityAnswerHash: varchar("security_answer_hash", {
    length: 128,
  }).notNull(),
  securityAnswerSalt: varchar("security_answer_salt", {
    length: 64,
  }).notNull(),
  createdAt: timestamp("created_at").notNull().defaultNow(),
});
