/**
 * Storage account with optional blob containers.
 *
 * The `blobServices/default` parent exists only to host containers, so it is
 * provisioned only when at least one container is requested.
 */

import { Type } from "@sinclair/typebox";
import { attr } from "../graph/expressions.js";
import { hostedFanOut, resource } from "../graph/declare.js";
import { Choice } from "../graph/parameters.js";
import type { Template } from "../types.js";
import { Location, RESOURCE_TYPES, Tags } from "./common.js";

export const ContainerSchema = Type.Object(
  {
    name: Type.String({ minLength: 3, maxLength: 63, pattern: "^[a-z0-9](?!.*--)[a-z0-9-]*[a-z0-9]$" }),
    publicAccess: Type.Optional(Choice(["None", "Blob", "Container"])),
  },
  { additionalProperties: false },
);

const StorageParameters = Type.Object(
  {
    name: Type.String({ minLength: 3, maxLength: 24, pattern: "^[a-z0-9]+$", description: "Globally unique account name" }),
    location: Location(),
    tags: Tags(),
    kind: Choice(["StorageV2", "BlobStorage", "BlockBlobStorage", "FileStorage", "Storage"], { default: "StorageV2" }),
    skuName: Choice(
      ["Standard_LRS", "Standard_GRS", "Standard_RAGRS", "Standard_ZRS", "Standard_GZRS", "Standard_RAGZRS", "Premium_LRS", "Premium_ZRS"],
      { default: "Standard_LRS" },
    ),
    accessTier: Choice(["Hot", "Cool", "Premium"], { default: "Hot" }),
    minimumTlsVersion: Choice(["TLS1_0", "TLS1_1", "TLS1_2"], { default: "TLS1_2" }),
    allowBlobPublicAccess: Type.Boolean({ default: false }),
    allowSharedKeyAccess: Type.Boolean({ default: true }),
    containers: Type.Array(ContainerSchema, { default: [], description: "Blob containers; publicAccess defaults to None" }),
  },
  { additionalProperties: false },
);

export const storageTemplate: Template<typeof StorageParameters> = {
  id: "storage",
  name: "Storage account",
  description: "A storage account and zero or more blob containers",
  parameters: StorageParameters,

  declare(p) {
    const account = resource("storageAccount", {
      type: RESOURCE_TYPES.storageAccount,
      name: p.name,
      location: p.location,
      tags: p.tags,
      properties: {
        kind: p.kind,
        sku: { name: p.skuName },
        properties: {
          accessTier: p.accessTier,
          minimumTlsVersion: p.minimumTlsVersion,
          allowBlobPublicAccess: p.allowBlobPublicAccess,
          allowSharedKeyAccess: p.allowSharedKeyAccess,
          supportsHttpsTrafficOnly: true,
        },
      },
    });

    const [blobServices, containers] = hostedFanOut(
      resource("blobServices", { type: RESOURCE_TYPES.blobServices, name: "default", parent: "storageAccount" }),
      "containers",
      p.containers,
      (container) => ({
        type: RESOURCE_TYPES.blobContainer,
        name: container.name,
        properties: { properties: { publicAccess: container.publicAccess ?? "None" } },
      }),
    );

    return {
      declarations: [account, blobServices, containers],
      outputs: {
        name: { value: attr("storageAccount", "name") },
        id: { value: attr("storageAccount", "id") },
        primaryEndpoints: { value: attr("storageAccount", "properties.primaryEndpoints") },
        blobEndpoint: { value: attr("storageAccount", "properties.primaryEndpoints.blob") },
      },
    };
  },
};
