/**
 * Runtime schemas for raw VSS tree nodes.
 */

import { z } from 'zod';

export const SIGNAL_TYPES = ['sensor', 'actuator', 'attribute'] as const;
export const NODE_TYPES = ['branch', ...SIGNAL_TYPES] as const;

export type SignalType = typeof SIGNAL_TYPES[number];
export type NodeType = typeof NODE_TYPES[number];

/** Shape of an `instances` declaration; semantics are checked in instances.ts. */
export const instancesSchema = z.union([
    z.string(),
    z.array(z.union([z.string(), z.array(z.string())])),
]);

export const signalValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export type SignalValue = z.infer<typeof signalValueSchema>;

/** A leaf (sensor, actuator or attribute) node. Unknown keys are rejected. */
export const leafSchema = z.object({
    type: z.enum(SIGNAL_TYPES),
    datatype: z.string().min(1),
    description: z.string(),
    uuid: z.string().min(1),
    unit: z.string().optional(),
    min: z.number().finite().optional(),
    max: z.number().finite().optional(),
    enum: z.array(z.string()).min(1).optional(),
    default: signalValueSchema.optional(),
    comment: z.string().optional(),
    deprecation: z.string().optional(),
    instances: instancesSchema.optional(),
}).strict();

export type LeafNode = z.infer<typeof leafSchema>;

/** Keys a branch node may carry. */
export const BRANCH_KEYS: ReadonlySet<string> = new Set([
    'type',
    'description',
    'uuid',
    'children',
    'instances',
    'comment',
    'deprecation',
]);

export function isNodeType(value: unknown): value is NodeType {
    return NODE_TYPES.some(type => type === value);
}
