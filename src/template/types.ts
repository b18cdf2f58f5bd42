import type { JsonObject, JsonValue } from '../manifest/types.js';

/**
 * One processing node of a generation graph. `inputs` values are scalars or
 * link references (`[source_node_id, output_index]`), which stay opaque here.
 */
export type TemplateNode = {
  class_type: string;
  inputs: JsonObject;
} & { [key: string]: JsonValue };

/** Node id → node, in the backend's "API format". */
export type Template = Record<string, TemplateNode>;
