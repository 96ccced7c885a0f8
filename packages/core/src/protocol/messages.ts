// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Roaming backend message types and payload shapes.
 *
 * Field names follow the wire format (PascalCase JSON keys). Only the base
 * fields and `Result` are read by the client; operation-specific fields are
 * carried through as the peer sent them.
 */

/**
 * Message type tags. Request and answer of one operation form a pair; the
 * request tag identifies the pair in correlation keys.
 */
export const MessageType = {
  PRStartReq: "PRStartReq",
  PRStartAns: "PRStartAns",
  PRStopReq: "PRStopReq",
  PRStopAns: "PRStopAns",
  XmitDataReq: "XmitDataReq",
  XmitDataAns: "XmitDataAns",
  ProfileReq: "ProfileReq",
  ProfileAns: "ProfileAns",
  HomeNSReq: "HomeNSReq",
  HomeNSAns: "HomeNSAns",
} as const;

export type MessageType = (typeof MessageType)[keyof typeof MessageType];

/**
 * Request tags, one per operation.
 */
export const REQUEST_TYPES = [
  MessageType.PRStartReq,
  MessageType.PRStopReq,
  MessageType.XmitDataReq,
  MessageType.ProfileReq,
  MessageType.HomeNSReq,
] as const;

export type RequestType = (typeof REQUEST_TYPES)[number];

/**
 * Result codes. `Success` is the only success value; peers may send codes
 * outside this list, which are treated as failures like any other.
 */
export const ResultCode = {
  Success: "Success",
  MICFailed: "MICFailed",
  JoinReqFailed: "JoinReqFailed",
  NoRoamingAgreement: "NoRoamingAgreement",
  DevRoamingDisallowed: "DevRoamingDisallowed",
  RoamingActDisallowed: "RoamingActDisallowed",
  ActivationDisallowed: "ActivationDisallowed",
  UnknownDevEUI: "UnknownDevEUI",
  UnknownDevAddr: "UnknownDevAddr",
  UnknownSender: "UnknownSender",
  UnknownReceiver: "UnknownReceiver",
  Deferred: "Deferred",
  XmitFailed: "XmitFailed",
  InvalidFPort: "InvalidFPort",
  InvalidProtocolVersion: "InvalidProtocolVersion",
  StaleDeviceProfile: "StaleDeviceProfile",
  MalformedRequest: "MalformedRequest",
  FrameSizeError: "FrameSizeError",
  Other: "Other",
} as const;

export type KnownResultCode = (typeof ResultCode)[keyof typeof ResultCode];

// Keeps literal completion for known codes while accepting any string
export type ResultCodeValue = KnownResultCode | (string & {});

/** Hex-encoded bytes, as sent on the wire. */
export type HEXBytes = string;

export interface Result {
  ResultCode: ResultCodeValue;
  Description?: string;
}

export interface BasePayload {
  ProtocolVersion: string;
  SenderID: string;
  ReceiverID: string;
  TransactionID: number;
  MessageType: MessageType;
  SenderNSID?: string;
  ReceiverNSID?: string;
  SenderToken?: HEXBytes;
  ReceiverToken?: HEXBytes;
}

/**
 * Base fields of an answer. Peers often omit the routing metadata on
 * answers, so only TransactionID and Result are required.
 */
export interface BasePayloadResult {
  ProtocolVersion?: string;
  SenderID?: string;
  ReceiverID?: string;
  TransactionID: number;
  MessageType?: string;
  SenderNSID?: string;
  ReceiverNSID?: string;
  SenderToken?: HEXBytes;
  ReceiverToken?: HEXBytes;
  Result: Result;
}

export interface GWInfoElement {
  ID?: HEXBytes;
  FineRecvTime?: number;
  RFRegion?: string;
  RSSI?: number;
  SNR?: number;
  Lat?: number;
  Lon?: number;
  ULToken?: HEXBytes;
  DLAllowed?: boolean;
}

export interface ULMetaData {
  DevEUI?: HEXBytes;
  DevAddr?: HEXBytes;
  FPort?: number;
  FCntDown?: number;
  FCntUp?: number;
  Confirmed?: boolean;
  DataRate?: number;
  ULFreq?: number;
  Margin?: number;
  Battery?: number;
  FNSULToken?: HEXBytes;
  RecvTime?: string;
  RFRegion?: string;
  GWCnt?: number;
  GWInfo?: GWInfoElement[];
}

export interface DLMetaData {
  DevEUI?: HEXBytes;
  FPort?: number;
  FCntDown?: number;
  Confirmed?: boolean;
  DLFreq1?: number;
  DLFreq2?: number;
  RXDelay1?: number;
  ClassMode?: string;
  DataRate1?: number;
  DataRate2?: number;
  FNSULToken?: HEXBytes;
  GWInfo?: GWInfoElement[];
  HiPriorityFlag?: boolean;
}

export interface KeyEnvelope {
  KEKLabel?: string;
  AESKey: HEXBytes;
}

export interface PRStartReqPayload extends BasePayload {
  MessageType: typeof MessageType.PRStartReq;
  PHYPayload: HEXBytes;
  ULMetaData: ULMetaData;
}

export interface PRStartAnsPayload extends BasePayloadResult {
  PHYPayload?: HEXBytes;
  DevEUI?: HEXBytes;
  Lifetime?: number;
  FNwkSIntKey?: KeyEnvelope;
  NwkSKey?: KeyEnvelope;
  FCntUp?: number;
  ServiceProfile?: Record<string, unknown>;
  DLMetaData?: DLMetaData;
  DevAddr?: HEXBytes;
}

export interface PRStopReqPayload extends BasePayload {
  MessageType: typeof MessageType.PRStopReq;
  DevEUI: HEXBytes;
  Lifetime?: number;
}

export type PRStopAnsPayload = BasePayloadResult;

export interface XmitDataReqPayload extends BasePayload {
  MessageType: typeof MessageType.XmitDataReq;
  PHYPayload?: HEXBytes;
  FRMPayload?: HEXBytes;
  ULMetaData?: ULMetaData;
  DLMetaData?: DLMetaData;
}

export interface XmitDataAnsPayload extends BasePayloadResult {
  DLFreq1?: number;
  DLFreq2?: number;
}

export interface ProfileReqPayload extends BasePayload {
  MessageType: typeof MessageType.ProfileReq;
  DevEUI: HEXBytes;
}

export interface ProfileAnsPayload extends BasePayloadResult {
  DeviceProfile?: Record<string, unknown>;
  DeviceProfileTimestamp?: string;
  RoamingActivationType?: string;
}

export interface HomeNSReqPayload extends BasePayload {
  MessageType: typeof MessageType.HomeNSReq;
  DevEUI: HEXBytes;
}

export interface HomeNSAnsPayload extends BasePayloadResult {
  HNetID?: HEXBytes;
}

/**
 * Request/answer payload pair per operation, keyed by request tag.
 */
export interface OperationMap {
  PRStartReq: { request: PRStartReqPayload; answer: PRStartAnsPayload };
  PRStopReq: { request: PRStopReqPayload; answer: PRStopAnsPayload };
  XmitDataReq: { request: XmitDataReqPayload; answer: XmitDataAnsPayload };
  ProfileReq: { request: ProfileReqPayload; answer: ProfileAnsPayload };
  HomeNSReq: { request: HomeNSReqPayload; answer: HomeNSAnsPayload };
}

export type RequestOf<T extends RequestType> = OperationMap[T]["request"];
export type AnswerOf<T extends RequestType> = OperationMap[T]["answer"];

/**
 * Fields the client stamps on every outgoing request.
 */
export type StampedField =
  | "ProtocolVersion"
  | "SenderID"
  | "ReceiverID"
  | "MessageType"
  | "TransactionID";

/**
 * What a caller supplies for a request: the operation body, optionally with
 * a pre-chosen TransactionID.
 */
export type RequestInput<T extends RequestType> = Omit<
  RequestOf<T>,
  StampedField
> & { TransactionID?: number };
