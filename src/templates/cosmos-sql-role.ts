/**
 * Data-plane role assignment on a Cosmos DB account, for identities that
 * access data without account keys.
 */

import { Type } from "@sinclair/typebox";
import { attr, concat, Deferrable } from "../graph/expressions.js";
import { resource } from "../graph/declare.js";
import type { Template } from "../types.js";
import { cosmosSqlRoleGuid } from "./catalog.js";
import { RESOURCE_TYPES } from "./common.js";
import { guid, seedOf } from "./naming.js";

const CosmosSqlRoleParameters = Type.Object(
  {
    accountName: Deferrable(Type.String()),
    principalId: Deferrable(Type.String()),
    roleName: Type.String({ default: "Cosmos DB Built-in Data Contributor" }),
  },
  { additionalProperties: false },
);

export const cosmosSqlRoleTemplate: Template<typeof CosmosSqlRoleParameters> = {
  id: "cosmos-sql-role",
  name: "Cosmos DB data role",
  description: "Grants a principal a built-in Cosmos DB data-plane role",
  parameters: CosmosSqlRoleParameters,

  declare(p, context) {
    const roleId = cosmosSqlRoleGuid(p.roleName, "roleName");
    return {
      declarations: [
        resource("cosmosAccount", {
          type: RESOURCE_TYPES.cosmosAccount,
          name: p.accountName,
          existing: true,
        }),
        resource("sqlRoleAssignment", {
          type: RESOURCE_TYPES.cosmosSqlRoleAssignment,
          name: guid(context.subscriptionId, seedOf(p.accountName), seedOf(p.principalId), roleId),
          parent: "cosmosAccount",
          properties: {
            properties: {
              roleDefinitionId: concat(attr("cosmosAccount", "id"), `/sqlRoleDefinitions/${roleId}`),
              principalId: p.principalId,
              scope: attr("cosmosAccount", "id"),
            },
          },
        }),
      ],
      outputs: {
        roleAssignmentId: { value: attr("sqlRoleAssignment", "id") },
      },
    };
  },
};
