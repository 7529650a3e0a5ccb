/**
 * Archiver Applianceのレスポンススキーマ
 * 受信したJSONは必ずここで検証してから利用する
 */
import { z } from 'zod';
import { ResponseDecodeError } from './errors';

const scalarValueSchema = z.union([z.number(), z.string()]);

export const sampleValueSchema = z.union([
  scalarValueSchema,
  z.array(scalarValueSchema),
]);

/**
 * getData / getDataAtTime の1サンプル
 */
export const rawSampleSchema = z.object({
  secs: z.number().int(),
  nanos: z.number().int().min(0).default(0),
  val: sampleValueSchema,
  severity: z.number().int().default(0),
  status: z.number().int().default(0),
  fields: z.record(z.string(), z.unknown()).optional(),
});

export const pvMetaSchema = z
  .object({ name: z.string() })
  .catchall(z.unknown());

/**
 * getData.json のレスポンス（PVごとに meta と data を持つ配列）
 */
export const dataResponseSchema = z.array(
  z.object({
    meta: pvMetaSchema,
    data: z.array(rawSampleSchema),
  })
);

/**
 * getDataAtTime のレスポンス（PV名→サンプル）
 */
export const dataAtTimeResponseSchema = z.record(z.string(), rawSampleSchema);

export const pvNameListSchema = z.array(z.string());

export const applianceInfoSchema = z
  .object({
    identity: z.string(),
    version: z.string().optional(),
    mgmtURL: z.string().optional(),
    retrievalURL: z.string().optional(),
    dataRetrievalURL: z.string().optional(),
  })
  .catchall(z.unknown());

export const pvStatusSchema = z
  .object({
    pvName: z.string(),
    status: z.string(),
  })
  .catchall(z.unknown());

export const pvStatusListSchema = z.array(pvStatusSchema);

export const pvTypeInfoSchema = z
  .object({ pvName: z.string() })
  .catchall(z.unknown());

export const pvDetailSchema = z.object({
  name: z.string(),
  value: z.string(),
  source: z.string().optional(),
});

export const pvDetailListSchema = z.array(pvDetailSchema);

export const storesSchema = z.record(z.string(), z.string());

/**
 * 管理操作（archivePV, pauseArchivingPV 等）の結果1件分
 */
export const managementReplySchema = z
  .object({
    pvName: z.string().optional(),
    status: z.string().optional(),
    validation: z.string().optional(),
    error: z.string().optional(),
  })
  .catchall(z.unknown());

export const managementResponseSchema = z.union([
  managementReplySchema,
  z.array(managementReplySchema),
]);

export type RawSample = z.infer<typeof rawSampleSchema>;
export type SampleValue = z.infer<typeof sampleValueSchema>;
export type PVMeta = z.infer<typeof pvMetaSchema>;
export type ApplianceInfo = z.infer<typeof applianceInfoSchema>;
export type PVStatus = z.infer<typeof pvStatusSchema>;
export type PVTypeInfo = z.infer<typeof pvTypeInfoSchema>;
export type PVDetail = z.infer<typeof pvDetailSchema>;
export type ManagementReply = z.infer<typeof managementReplySchema>;

/**
 * スキーマでレスポンスを検証し、型付きの値を返す
 * @param schema 検証に使うスキーマ
 * @param body 受信したボディ
 * @param context エラー表示用のエンドポイント名
 * @param pv 対象PV（エラーに付与）
 * @throws ResponseDecodeError
 */
export function decodeResponse<S extends z.ZodTypeAny>(
  schema: S,
  body: unknown,
  context: string,
  pv?: string
): z.infer<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issues = result.error.issues.map(
      issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ResponseDecodeError(context, issues, { pv, cause: result.error });
  }
  return result.data;
}
