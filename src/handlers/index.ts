export * from './common';
export * from './params';
export * from './cidr';
export { createVpcWithDefaults, findDefaultVpc, renderVpc, vpcHandler } from './vpc';
export { allocatePrivateIp, createSubnet, releasePrivateIp, renderSubnet, subnetHandler } from './subnet';
export { normalizeProtocol, renderSecurityGroup, securityGroupHandler } from './security-group';
export { internetGatewayHandler, renderInternetGateway } from './internet-gateway';
export { renderRouteTable, routeTableHandler } from './route-table';
export { INSTANCE_STATE_CODES, instanceHandler, renderInstance } from './instance';
export { createVolume, renderVolume, volumeHandler } from './volume';
export { keyPairHandler, parseOpenSshPublicKey, renderKeyPair } from './key-pair';
export { elasticIpHandler, renderAddress } from './elastic-ip';
export { tagsHandler } from './tags';
export { availabilityZones, regionHandler, REGIONS } from './regions';
export { stsHandler } from './sts';

import type { ResourceHandler } from '../gateway/types';
import { elasticIpHandler } from './elastic-ip';
import { instanceHandler } from './instance';
import { internetGatewayHandler } from './internet-gateway';
import { keyPairHandler } from './key-pair';
import { regionHandler } from './regions';
import { routeTableHandler } from './route-table';
import { securityGroupHandler } from './security-group';
import { stsHandler } from './sts';
import { subnetHandler } from './subnet';
import { tagsHandler } from './tags';
import { volumeHandler } from './volume';
import { vpcHandler } from './vpc';

/** Every handler shipped with the emulator. */
export function builtinHandlers(): ResourceHandler[] {
  return [
    vpcHandler,
    subnetHandler,
    securityGroupHandler,
    internetGatewayHandler,
    routeTableHandler,
    instanceHandler,
    volumeHandler,
    keyPairHandler,
    elasticIpHandler,
    tagsHandler,
    regionHandler,
    stsHandler,
  ];
}
