// provider/aws/network.ts - S3 gateway VPC endpoint

import {
  EC2Client,
  DescribeRouteTablesCommand,
  DescribeVpcEndpointsCommand,
  CreateVpcEndpointCommand,
  DeleteVpcEndpointsCommand,
} from "@aws-sdk/client-ec2";
import { ConcreteProviderError, isNotFound, mapAwsError, withProviderErrorMapping } from "../errors";
import type { NetworkProvider } from "../types";

/** Endpoint states that still route traffic (or soon will) */
const LIVE_STATES = ["pending", "available", "pendingacceptance"];

export function s3ServiceName(region: string): string {
  return `com.amazonaws.${region}.s3`;
}

export class Ec2NetworkProvider implements NetworkProvider {
  private readonly client: EC2Client;

  constructor(region: string) {
    this.client = new EC2Client({ region });
  }

  async findGatewayEndpoint(vpcId: string, serviceName: string): Promise<string | null> {
    const result = await withProviderErrorMapping("aws",
      () => this.client.send(new DescribeVpcEndpointsCommand({
        Filters: [
          { Name: "vpc-id", Values: [vpcId] },
          { Name: "service-name", Values: [serviceName] },
          { Name: "vpc-endpoint-type", Values: ["Gateway"] },
          { Name: "vpc-endpoint-state", Values: LIVE_STATES },
        ],
      })),
      mapAwsError
    );
    return result.VpcEndpoints?.find((endpoint) => endpoint.VpcEndpointId)?.VpcEndpointId ?? null;
  }

  async createGatewayEndpoint(vpcId: string, serviceName: string): Promise<string> {
    return withProviderErrorMapping("aws", async () => {
      const tables = await this.client.send(new DescribeRouteTablesCommand({
        Filters: [{ Name: "vpc-id", Values: [vpcId] }],
      }));
      const routeTableIds = (tables.RouteTables ?? [])
        .map((table) => table.RouteTableId)
        .filter((id): id is string => typeof id === "string");
      if (routeTableIds.length === 0) {
        throw new ConcreteProviderError("aws", "INVALID_STATE", `VPC ${vpcId} has no route tables`, {
          details: { vpcId },
        });
      }

      const result = await this.client.send(new CreateVpcEndpointCommand({
        VpcId: vpcId,
        ServiceName: serviceName,
        VpcEndpointType: "Gateway",
        RouteTableIds: routeTableIds,
      }));
      const endpointId = result.VpcEndpoint?.VpcEndpointId;
      if (!endpointId) {
        throw new ConcreteProviderError("aws", "PROVIDER_INTERNAL", "CreateVpcEndpoint returned no endpoint id");
      }
      return endpointId;
    }, mapAwsError);
  }

  async endpointExists(endpointId: string): Promise<boolean> {
    try {
      const result = await withProviderErrorMapping("aws",
        () => this.client.send(new DescribeVpcEndpointsCommand({ VpcEndpointIds: [endpointId] })),
        mapAwsError
      );
      return (result.VpcEndpoints ?? []).some(
        (endpoint) => endpoint.State !== undefined && LIVE_STATES.includes(endpoint.State.toLowerCase())
      );
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  async deleteEndpoint(endpointId: string): Promise<void> {
    const result = await withProviderErrorMapping("aws",
      () => this.client.send(new DeleteVpcEndpointsCommand({ VpcEndpointIds: [endpointId] })),
      mapAwsError
    );
    const failure = result.Unsuccessful?.[0];
    if (failure) {
      throw new ConcreteProviderError("aws", "PROVIDER_INTERNAL",
        `Failed to delete VPC endpoint ${endpointId}: ${failure.Error?.Message ?? failure.Error?.Code ?? "unknown"}`,
        { details: { endpointId } }
      );
    }
  }
}
