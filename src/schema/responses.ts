/**
 * Wire shapes for the scanning and hosting APIs.
 * Attribute maps are open on the wire, so schemas pass unknown keys through
 * and the mappers below turn them into explicit structs with defaults.
 */

import { z } from "zod";
import type { ScanProject } from "./types.js";

// ── Scanning API (JSON:API) ──

const relationshipRef = z
  .object({
    data: z
      .object({
        id: z.string().optional(),
        type: z.string().optional(),
        attributes: z.record(z.unknown()).optional(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export const organizationResource = z
  .object({
    id: z.string(),
    attributes: z
      .object({
        name: z.string().optional(),
        slug: z.string().optional(),
        group_id: z.string().nullish(),
      })
      .passthrough()
      .default({}),
  })
  .passthrough();

export const targetResource = z
  .object({
    id: z.string(),
    attributes: z
      .object({
        display_name: z.string().optional(),
        url: z.string().nullish(),
        type: z.string().optional(),
      })
      .passthrough()
      .default({}),
    relationships: z
      .object({
        integration: relationshipRef.optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const projectResource = z
  .object({
    id: z.string(),
    attributes: z
      .object({
        name: z.string().optional(),
        type: z.string().optional(),
        created: z.string().nullish(),
        target_id: z.string().nullish(),
        target_reference: z.string().nullish(),
        url: z.string().nullish(),
        root: z.string().nullish(),
        target_file: z.unknown().optional(),
        target_file_path: z.unknown().optional(),
        file_path: z.unknown().optional(),
        path: z.unknown().optional(),
        target_files: z.unknown().optional(),
      })
      .passthrough()
      .default({}),
    relationships: z
      .object({
        target: relationshipRef.optional(),
        organization: relationshipRef.optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type OrganizationResource = z.infer<typeof organizationResource>;
export type TargetResource = z.infer<typeof targetResource>;
export type ProjectResource = z.infer<typeof projectResource>;

/** `{ data: [...] }` list body */
export function listBody<T extends z.ZodTypeAny>(item: T) {
  return z.object({ data: z.array(item) }).passthrough();
}

/** `{ data: {...} }` single-resource body */
export function singleBody<T extends z.ZodTypeAny>(item: T) {
  return z.object({ data: item }).passthrough();
}

// ── Hosting API (GitLab v4) ──

export const hostProject = z
  .object({
    id: z.number(),
    path_with_namespace: z.string(),
    web_url: z.string(),
    default_branch: z.string().nullish(),
    archived: z.boolean().optional(),
  })
  .passthrough();

export const treeEntry = z
  .object({
    path: z.string(),
    type: z.string(),
  })
  .passthrough();

export type HostProject = z.infer<typeof hostProject>;
export type TreeEntry = z.infer<typeof treeEntry>;

// ── Mappers ──

const FILE_PATH_ATTRIBUTES = ["target_file", "target_file_path", "file_path", "path"] as const;

/** Every file path a project's attributes declare, in attribute order, without repeats */
export function declaredFilesOf(attributes: ProjectResource["attributes"]): string[] {
  const files: string[] = [];
  for (const key of FILE_PATH_ATTRIBUTES) {
    const value = attributes[key];
    if (typeof value === "string" && value.length > 0) files.push(value);
  }
  const many = attributes.target_files;
  if (Array.isArray(many)) {
    for (const value of many) {
      if (typeof value === "string" && value.length > 0) files.push(value);
    }
  }
  return [...new Set(files)];
}

export function toScanProject(resource: ProjectResource, orgId: string): ScanProject {
  const attrs = resource.attributes;
  const targetId = attrs.target_id ?? resource.relationships?.target?.data?.id ?? undefined;
  const targetReference = attrs.target_reference || attrs.url || undefined;
  return {
    id: resource.id,
    name: attrs.name ?? resource.id,
    orgId: resource.relationships?.organization?.data?.id ?? orgId,
    ...(targetId ? { targetId } : {}),
    ...(targetReference ? { targetReference } : {}),
    type: attrs.type ?? "unknown",
    ...(attrs.created ? { created: attrs.created } : {}),
    declaredFiles: declaredFilesOf(attrs),
    root: attrs.root ?? "",
  };
}

/** Integration type of a target that names neither an integration nor a type */
export const UNKNOWN_INTEGRATION = "unknown";

/** Integration type from the relationship, then the target's own type */
export function integrationTypeOf(resource: TargetResource): string {
  const fromRelationship = resource.relationships?.integration?.data?.attributes?.integration_type;
  if (typeof fromRelationship === "string" && fromRelationship.length > 0) return fromRelationship;
  return resource.attributes.type ?? UNKNOWN_INTEGRATION;
}
