// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { z } from "zod";
import { MAX_TRANSACTION_ID } from "../constants.js";
import type {
  AnswerOf,
  HomeNSAnsPayload,
  PRStartAnsPayload,
  PRStopAnsPayload,
  ProfileAnsPayload,
  RequestType,
  XmitDataAnsPayload,
} from "./messages.js";

/**
 * Answer schemas.
 *
 * Only the fields the client acts on are checked: TransactionID and
 * Result.ResultCode are required, the routing metadata is type-checked when
 * present. Operation-specific fields pass through untouched and are typed by
 * the operation's payload interface.
 */

export const TransactionIDSchema = z
  .number()
  .int()
  .min(0)
  .max(MAX_TRANSACTION_ID);

export const ResultSchema = z
  .object({
    ResultCode: z.string().min(1),
    Description: z.string().optional(),
  })
  .passthrough();

export const BaseAnswerSchema = z
  .object({
    ProtocolVersion: z.string().optional(),
    SenderID: z.string().optional(),
    ReceiverID: z.string().optional(),
    TransactionID: TransactionIDSchema,
    MessageType: z.string().optional(),
    SenderNSID: z.string().optional(),
    ReceiverNSID: z.string().optional(),
    SenderToken: z.string().optional(),
    ReceiverToken: z.string().optional(),
    Result: ResultSchema,
  })
  .passthrough();

function answer<T>() {
  return BaseAnswerSchema.pipe(z.custom<T>());
}

type AnswerSchemaMap = {
  [K in RequestType]: z.ZodType<AnswerOf<K>, z.ZodTypeDef, unknown>;
};

export const ANSWER_SCHEMAS: AnswerSchemaMap = {
  PRStartReq: answer<PRStartAnsPayload>(),
  PRStopReq: answer<PRStopAnsPayload>(),
  XmitDataReq: answer<XmitDataAnsPayload>(),
  ProfileReq: answer<ProfileAnsPayload>(),
  HomeNSReq: answer<HomeNSAnsPayload>(),
};

export type BaseAnswer = z.infer<typeof BaseAnswerSchema>;
