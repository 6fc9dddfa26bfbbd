import { z } from 'zod';

/** 參考資料摘要（由上游內容策略流程提供） */
export const materialSummarySchema = z.object({
  mainTopic: z.string().optional(),
  technologies: z.array(z.string()).default([]),
  keyConcepts: z.array(z.string()).default([]),
  documentType: z.string().optional(),
});

/** 排序查詢的語境 */
export const queryContextSchema = z.object({
  goal: z.string().trim().min(1, 'goal is required'),
  audience: z.string().optional(),
  service: z.string().optional(),
  materials: z.array(materialSummarySchema).default([]),
});

export type MaterialSummary = z.infer<typeof materialSummarySchema>;
export type QueryContext = z.infer<typeof queryContextSchema>;
/** 呼叫端傳入的形式（陣列欄位可省略） */
export type QueryContextInput = z.input<typeof queryContextSchema>;
