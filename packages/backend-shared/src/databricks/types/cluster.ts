import { z } from "zod";

export const clusterSummarySchema = z.object({
  cluster_id: z.string(),
  cluster_name: z.string().default(""),
  cluster_source: z.string().optional(),
  autotermination_minutes: z.number().int().optional(),
  state: z.string().optional(),
});

export type ClusterSummary = z.infer<typeof clusterSummarySchema>;

export const listClustersResponseSchema = z.object({
  clusters: z.array(clusterSummarySchema).default([]),
  next_page_token: z.string().optional(),
});

export type ListClustersResponse = z.infer<typeof listClustersResponseSchema>;
