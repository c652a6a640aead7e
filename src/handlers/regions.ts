/**
 * Region, availability zone and account attribute lookups.
 *
 * These describe fixed provider data rather than stored resources, but are
 * filtered with the same evaluator by presenting each row as a filter subject.
 */

import { evaluateAll, FilterSubject } from '../domain/filters';
import type { FilterPathTable } from '../domain/resource-types';
import type { ValueMap } from '../domain/value-tree';
import { ServiceException, validationError } from '../domain/errors';
import { attrString, defineEc2Handler } from './common';
import { getBoolean, getStringList, parseFilters } from './params';

export const REGIONS = [
  'us-east-1',
  'us-east-2',
  'us-west-1',
  'us-west-2',
  'ca-central-1',
  'eu-central-1',
  'eu-west-1',
  'eu-west-2',
  'eu-west-3',
  'eu-north-1',
  'ap-south-1',
  'ap-northeast-1',
  'ap-northeast-2',
  'ap-northeast-3',
  'ap-southeast-1',
  'ap-southeast-2',
  'sa-east-1',
] as const;

const ZONE_SUFFIXES = ['a', 'b', 'c'];

const DIRECTION_ABBREVIATIONS: Record<string, string> = {
  east: 'e',
  west: 'w',
  north: 'n',
  south: 's',
  central: 'c',
  northeast: 'ne',
  northwest: 'nw',
  southeast: 'se',
  southwest: 'sw',
};

/** `us-east-1` → `use1`, `ap-southeast-2` → `apse2`. */
export function regionShortName(region: string): string {
  const [area, direction = '', number = ''] = region.split('-');
  return `${area}${DIRECTION_ABBREVIATIONS[direction] ?? direction.slice(0, 1)}${number}`;
}

export interface AvailabilityZone {
  zoneName: string;
  zoneId: string;
  regionName: string;
}

export function availabilityZones(region: string): AvailabilityZone[] {
  return ZONE_SUFFIXES.map((suffix, index) => ({
    zoneName: `${region}${suffix}`,
    zoneId: `${regionShortName(region)}-az${index + 1}`,
    regionName: region,
  }));
}

export function findAvailabilityZone(region: string, nameOrId: string): AvailabilityZone | undefined {
  return availabilityZones(region).find((zone) => zone.zoneName === nameOrId || zone.zoneId === nameOrId);
}

function row(attributes: ValueMap): FilterSubject {
  return { attributes, tags: [] };
}

const REGION_FILTERS: FilterPathTable = {
  'region-name': 'regionName',
  endpoint: 'regionEndpoint',
  'opt-in-status': 'optInStatus',
};

const ZONE_FILTERS: FilterPathTable = {
  'zone-name': 'zoneName',
  'zone-id': 'zoneId',
  'region-name': 'regionName',
  state: 'state',
  'zone-type': 'zoneType',
  'group-name': 'groupName',
  'opt-in-status': 'optInStatus',
};

function selectByName(rows: FilterSubject[], names: string[], key: string, notFoundCode: string): FilterSubject[] {
  if (names.length === 0) return rows;
  for (const name of names) {
    if (!rows.some((r) => attrString(r.attributes, key) === name)) {
      throw new ServiceException(validationError(notFoundCode, `The ${key} '${name}' does not exist`));
    }
  }
  return rows.filter((r) => names.includes(attrString(r.attributes, key) ?? ''));
}

export const regionHandler = defineEc2Handler('region', {
  async DescribeRegions(params) {
    // Every listed region is enabled, so AllRegions changes nothing.
    getBoolean(params, 'AllRegions');
    const rows = REGIONS.map((region) =>
      row({
        regionName: region,
        regionEndpoint: `ec2.${region}.amazonaws.com`,
        optInStatus: 'opt-in-not-required',
      }),
    );
    const selected = selectByName(rows, getStringList(params, 'RegionName'), 'regionName', 'InvalidParameterValue');
    return {
      regionInfo: evaluateAll(selected, parseFilters(params), REGION_FILTERS).map((r) => r.attributes),
    };
  },

  async DescribeAvailabilityZones(params, ctx) {
    const rows = availabilityZones(ctx.region).map((zone) =>
      row({
        zoneName: zone.zoneName,
        zoneId: zone.zoneId,
        state: 'available',
        regionName: zone.regionName,
        zoneType: 'availability-zone',
        groupName: zone.regionName,
        networkBorderGroup: zone.regionName,
        optInStatus: 'opt-in-not-required',
        messageSet: [],
      }),
    );
    let selected = selectByName(rows, getStringList(params, 'ZoneName'), 'zoneName', 'InvalidParameterValue');
    selected = selectByName(selected, getStringList(params, 'ZoneId'), 'zoneId', 'InvalidParameterValue');
    return {
      availabilityZoneInfo: evaluateAll(selected, parseFilters(params), ZONE_FILTERS).map((r) => r.attributes),
    };
  },

  async DescribeAccountAttributes(params, ctx) {
    const defaultVpc = (await ctx.store.list('vpc')).find((vpc) => vpc.attributes.isDefault === true);
    const attributes: Record<string, string[]> = {
      'supported-platforms': ['VPC'],
      'default-vpc': [defaultVpc ? defaultVpc.id : 'none'],
      'max-instances': ['20'],
      'max-elastic-ips': ['5'],
      'vpc-max-elastic-ips': ['5'],
      'vpc-max-security-groups-per-interface': ['5'],
    };
    const requested = getStringList(params, 'AttributeName');
    const names = requested.length > 0 ? requested : Object.keys(attributes);
    return {
      accountAttributeSet: names
        .filter((name) => Object.prototype.hasOwnProperty.call(attributes, name))
        .map((name) => ({
          attributeName: name,
          attributeValueSet: attributes[name].map((value) => ({ attributeValue: value })),
        })),
    };
  },
});
