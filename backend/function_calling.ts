import { z } from 'zod';

import { emptyArgsSchema, saveModelColorArgsSchema } from './schema';
import type { FunctionResult, UserService } from './services/user';

/*
  Function declarations handed to the generative model's tool-calling API.
  Parameters follow the OpenAPI-style schema those APIs accept.
*/
export interface ParameterSchema {
  type: 'OBJECT';
  properties: Record<string, { type: 'STRING'; description: string }>;
  required?: string[];
}

export interface FunctionDeclaration {
  name: string;
  description: string;
  parameters: ParameterSchema;
}

interface FunctionEntry {
  declaration: FunctionDeclaration;
  call(service: UserService, userId: string, args: unknown): Promise<FunctionResult>;
}

export class UnknownFunctionError extends Error {
  constructor(public readonly functionName: string) {
    super(`Unknown function '${functionName}'`);
    this.name = 'UnknownFunctionError';
  }
}

export class FunctionArgumentsError extends Error {
  constructor(
    public readonly functionName: string,
    public readonly issues: z.ZodIssue[]
  ) {
    super(`Invalid arguments for '${functionName}'`);
    this.name = 'FunctionArgumentsError';
  }
}

function defineFunction<S extends z.ZodTypeAny>(
  declaration: FunctionDeclaration,
  argsSchema: S,
  invoke: (service: UserService, userId: string, args: z.infer<S>) => Promise<FunctionResult>
): FunctionEntry {
  return {
    declaration,
    call: (service, userId, args) => {
      const parsed = argsSchema.safeParse(args);
      if (!parsed.success) {
        throw new FunctionArgumentsError(declaration.name, parsed.error.issues);
      }
      return invoke(service, userId, parsed.data);
    },
  };
}

const REGISTRY: Record<string, FunctionEntry> = {
  fc_save_model_color: defineFunction(
    {
      name: 'fc_save_model_color',
      description: 'Save new color when user requests to update his game model. Input is a color in hex format',
      parameters: {
        type: 'OBJECT',
        properties: { color: { type: 'STRING', description: 'Hex color' } },
        required: ['color'],
      },
    },
    saveModelColorArgsSchema,
    (service, userId, { color }) => service.fcSaveModelColor(userId, color)
  ),
  fc_revert_model_color: defineFunction(
    {
      name: 'fc_revert_model_color',
      description: "Revert the color/material of user's model on their request.",
      parameters: { type: 'OBJECT', properties: {} },
    },
    emptyArgsSchema,
    (service, userId) => service.fcRevertModelColor(userId)
  ),
  fc_show_my_model: defineFunction(
    {
      name: 'fc_show_my_model',
      description: "Show user's model / character on the screen.",
      parameters: { type: 'OBJECT', properties: {} },
    },
    emptyArgsSchema,
    async (service, userId) => service.fcShowMyModel(userId)
  ),
  fc_show_my_avatar: defineFunction(
    {
      name: 'fc_show_my_avatar',
      description: "Show user's current avatar.",
      parameters: { type: 'OBJECT', properties: {} },
    },
    emptyArgsSchema,
    async (service, userId) => service.fcShowMyAvatar(userId)
  ),
};

export const FUNCTION_DECLARATIONS: FunctionDeclaration[] = Object.values(REGISTRY).map(
  (entry) => entry.declaration
);

export async function callFunction(
  service: UserService,
  name: string,
  userId: string,
  args: unknown = {}
): Promise<FunctionResult> {
  if (!Object.prototype.hasOwnProperty.call(REGISTRY, name)) {
    throw new UnknownFunctionError(name);
  }

  console.info(`Calling ${name}`);
  return REGISTRY[name].call(service, userId, args);
}
