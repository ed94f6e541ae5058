/**
 * Serverless Cosmos DB (SQL API) account for the inventory API: one database
 * and one container per requested collection.
 */

import { Type } from "@sinclair/typebox";
import { attr } from "../graph/expressions.js";
import { fanOut, resource } from "../graph/declare.js";
import { Choice } from "../graph/parameters.js";
import type { Template } from "../types.js";
import { Location, RESOURCE_TYPES, Tags } from "./common.js";

export const CosmosContainerSchema = Type.Object(
  {
    name: Type.String({ minLength: 1, maxLength: 255 }),
    partitionKeyPath: Type.String({ pattern: "^/", default: "/id" }),
  },
  { additionalProperties: false },
);

const CosmosParameters = Type.Object(
  {
    accountName: Type.String({ minLength: 3, maxLength: 44, pattern: "^[a-z0-9-]+$" }),
    location: Location(),
    tags: Tags(),
    databaseName: Type.String({ default: "inventory" }),
    containers: Type.Array(CosmosContainerSchema, { default: [{ name: "items", partitionKeyPath: "/category" }] }),
    serverless: Type.Boolean({ default: true }),
    consistencyLevel: Choice(["Eventual", "ConsistentPrefix", "Session", "BoundedStaleness", "Strong"], { default: "Session" }),
    disableLocalAuth: Type.Boolean({ default: true, description: "Require identity-based data access" }),
  },
  { additionalProperties: false },
);

export const cosmosTemplate: Template<typeof CosmosParameters> = {
  id: "cosmos",
  name: "Cosmos DB",
  description: "Serverless Cosmos DB account with a SQL database and containers",
  parameters: CosmosParameters,

  declare(p) {
    const account = resource("cosmosAccount", {
      type: RESOURCE_TYPES.cosmosAccount,
      name: p.accountName,
      location: p.location,
      tags: p.tags,
      properties: {
        kind: "GlobalDocumentDB",
        properties: {
          databaseAccountOfferType: "Standard",
          consistencyPolicy: { defaultConsistencyLevel: p.consistencyLevel },
          locations: [{ locationName: p.location, failoverPriority: 0, isZoneRedundant: false }],
          capabilities: p.serverless ? [{ name: "EnableServerless" }] : [],
          disableLocalAuth: p.disableLocalAuth,
        },
      },
    });

    const database = resource("database", {
      type: RESOURCE_TYPES.cosmosSqlDatabase,
      name: p.databaseName,
      parent: "cosmosAccount",
      properties: { properties: { resource: { id: p.databaseName } } },
    });

    const containers = fanOut(
      "containers",
      p.containers,
      (container) => ({
        type: RESOURCE_TYPES.cosmosSqlContainer,
        name: container.name,
        properties: {
          properties: {
            resource: {
              id: container.name,
              partitionKey: { paths: [container.partitionKeyPath], kind: "Hash" },
            },
          },
        },
      }),
      { parent: "database" },
    );

    return {
      declarations: [account, database, containers],
      outputs: {
        id: { value: attr("cosmosAccount", "id") },
        accountName: { value: attr("cosmosAccount", "name") },
        endpoint: { value: attr("cosmosAccount", "properties.documentEndpoint") },
        databaseName: { value: p.databaseName },
        containerNames: { value: p.containers.map((c) => c.name) },
      },
    };
  },
};
