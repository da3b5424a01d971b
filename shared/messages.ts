// ============================================
// Network Messages
// Deployment client <-> deployment service exchange
// ============================================

import { z } from 'zod';
import { remoteConfigurationSchema, type RemoteConfiguration } from './config';

export const DeploymentEvents = {
  RequestConfig: 'deployment:request',
  Config: 'deployment:config',
  Rejected: 'deployment:rejected',
} as const;

// ============================================
// Deployment Client → Service
// ============================================

export interface ConfigRequestMessage {
  nodeId: string;
}

// ============================================
// Deployment Service → Client
// ============================================

export interface ConfigResponseMessage {
  nodeId: string;
  config: RemoteConfiguration;
}

export interface ConfigRejectedMessage {
  nodeId: string;
  reason: string;
}

// ============================================
// Payload validation
// Everything arriving off the wire is unknown until parsed
// ============================================

export const configRequestSchema = z.object({
  nodeId: z.string().min(1),
});

export const configResponseSchema = z.object({
  nodeId: z.string(),
  config: remoteConfigurationSchema,
});

export const configRejectedSchema = z.object({
  nodeId: z.string(),
  reason: z.string(),
});
