import { schema as listFaultsSchema, listFaults } from "./list_faults";
import { schema as getFaultDetailsSchema, getFaultDetails } from "./get_fault_details";
import type { Tool } from "./types";

export const tools: Tool[] = [
  { ...listFaultsSchema, handler: listFaults },
  { ...getFaultDetailsSchema, handler: getFaultDetails },
];

export function findTool(name: string): Tool | undefined {
  return tools.find((t) => t.name === name);
}
