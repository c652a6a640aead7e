/**
 * Key pair actions.
 *
 * Created key pairs are real RSA or Ed25519 keys so the returned private key
 * material loads in SSH clients. Imported keys must be OpenSSH public keys.
 */

import { createHash, generateKeyPairSync, KeyObject } from 'crypto';
import { ServiceException, validationError } from '../domain/errors';
import { evaluateAll } from '../domain/filters';
import type { Resource } from '../domain/resource';
import { RESOURCE_TYPES } from '../domain/resource-types';
import type { ParameterTree, ValueMap } from '../domain/value-tree';
import type { ResourceStore } from '../storage/store';
import { attrString, defineEc2Handler, tagSet } from './common';
import { getString, getStringList, paginate, parseFilters, parseTagSpecifications, requireString } from './params';

export type KeyType = 'rsa' | 'ed25519';

const SSH_KEY_TYPES: Record<string, KeyType> = {
  'ssh-rsa': 'rsa',
  'ssh-ed25519': 'ed25519',
};

const MAX_KEY_NAME_LENGTH = 255;

export async function findKeyPairByName(store: ResourceStore, keyName: string): Promise<Resource | undefined> {
  return (await store.list('key-pair')).find((key) => key.attributes.keyName === keyName);
}

export function keyPairNotFound(keyName: string): ServiceException {
  return new ServiceException(
    validationError('InvalidKeyPair.NotFound', `The key pair '${keyName}' does not exist`, { keyName }),
  );
}

function colonHex(digest: Buffer): string {
  return digest.toString('hex').match(/../g)?.join(':') ?? '';
}

function sshString(data: Buffer): Buffer {
  const length = Buffer.alloc(4);
  length.writeUInt32BE(data.length);
  return Buffer.concat([length, data]);
}

/** Unsigned big-endian integer in SSH mpint form (leading zero when the high bit is set). */
function sshMpint(data: Buffer): Buffer {
  return sshString(data[0] >= 0x80 ? Buffer.concat([Buffer.from([0]), data]) : data);
}

function readSshString(blob: Buffer, offset: number): { value: Buffer; next: number } | undefined {
  if (offset + 4 > blob.length) return undefined;
  const length = blob.readUInt32BE(offset);
  const end = offset + 4 + length;
  if (end > blob.length) return undefined;
  return { value: blob.subarray(offset + 4, end), next: end };
}

function openSshPublicBlob(publicKey: KeyObject, type: KeyType): Buffer {
  const jwk = publicKey.export({ format: 'jwk' });
  if (type === 'ed25519') {
    return Buffer.concat([sshString(Buffer.from('ssh-ed25519')), sshString(Buffer.from(jwk.x ?? '', 'base64url'))]);
  }
  return Buffer.concat([
    sshString(Buffer.from('ssh-rsa')),
    sshMpint(Buffer.from(jwk.e ?? '', 'base64url')),
    sshMpint(Buffer.from(jwk.n ?? '', 'base64url')),
  ]);
}

interface GeneratedKey {
  keyMaterial: string;
  fingerprint: string;
  publicKey: string;
}

function generateKey(type: KeyType): GeneratedKey {
  if (type === 'ed25519') {
    const { publicKey, privateKey } = generateKeyPairSync('ed25519');
    const blob = openSshPublicBlob(publicKey, type);
    return {
      keyMaterial: privateKey.export({ type: 'pkcs8', format: 'pem' }).toString(),
      fingerprint: createHash('sha256').update(blob).digest('base64').replace(/=+$/, ''),
      publicKey: `ssh-ed25519 ${blob.toString('base64')}`,
    };
  }
  const { publicKey, privateKey } = generateKeyPairSync('rsa', { modulusLength: 2048 });
  const der = privateKey.export({ type: 'pkcs8', format: 'der' });
  return {
    keyMaterial: privateKey.export({ type: 'pkcs1', format: 'pem' }).toString(),
    fingerprint: colonHex(createHash('sha1').update(der).digest()),
    publicKey: `ssh-rsa ${openSshPublicBlob(publicKey, type).toString('base64')}`,
  };
}

/**
 * Parse an OpenSSH public key line (`ssh-rsa AAAA... comment`). The
 * material may arrive base64-encoded, as the CLI sends file contents.
 */
export function parseOpenSshPublicKey(material: string): { type: KeyType; blob: Buffer } {
  const invalid = new ServiceException(
    validationError('InvalidKey.Format', 'Key is not in valid OpenSSH public key format'),
  );
  let text = material.trim();
  if (!/^ssh-/.test(text)) text = Buffer.from(text, 'base64').toString('utf8').trim();

  const [typeName, encoded] = text.split(/\s+/);
  const type = SSH_KEY_TYPES[typeName];
  if (!type || !encoded || !/^[A-Za-z0-9+/]+={0,2}$/.test(encoded)) throw invalid;

  const blob = Buffer.from(encoded, 'base64');
  const header = readSshString(blob, 0);
  if (!header || header.value.toString('utf8') !== typeName || header.next >= blob.length) throw invalid;
  return { type, blob };
}

export function renderKeyPair(key: Resource): ValueMap {
  return {
    keyPairId: key.id,
    keyName: key.attributes.keyName,
    keyFingerprint: key.attributes.keyFingerprint,
    keyType: key.attributes.keyType,
    createTime: key.createdAt,
    tagSet: tagSet(key.tags),
  };
}

async function createKeyPairResource(
  store: ResourceStore,
  keyName: string,
  attributes: ValueMap,
  params: ParameterTree,
): Promise<Resource> {
  if (keyName.length > MAX_KEY_NAME_LENGTH) {
    throw new ServiceException(validationError('InvalidParameterValue', `Key name is too long: ${keyName.length} characters`));
  }
  const tags = parseTagSpecifications(params, 'key-pair');
  if (await findKeyPairByName(store, keyName)) {
    throw new ServiceException(
      validationError('InvalidKeyPair.Duplicate', `The keypair '${keyName}' already exists.`, { keyName }),
    );
  }
  return store.create('key-pair', { keyName, ...attributes }, tags);
}

export const keyPairHandler = defineEc2Handler('key-pair', {
  async CreateKeyPair(params, ctx) {
    const keyName = requireString(params, 'KeyName');
    const keyType = getString(params, 'KeyType') ?? 'rsa';
    if (keyType !== 'rsa' && keyType !== 'ed25519') {
      throw new ServiceException(validationError('InvalidParameterValue', `Invalid KeyType: ${keyType}`));
    }
    const keyFormat = getString(params, 'KeyFormat') ?? 'pem';
    if (keyFormat !== 'pem') {
      throw new ServiceException(validationError('InvalidParameterValue', `Unsupported KeyFormat: ${keyFormat}`));
    }

    const generated = generateKey(keyType);
    const key = await createKeyPairResource(
      ctx.store,
      keyName,
      { keyFingerprint: generated.fingerprint, keyType, publicKey: generated.publicKey },
      params,
    );
    ctx.logger.info('Key pair created', { keyPairId: key.id, keyName });
    return {
      keyName,
      keyFingerprint: generated.fingerprint,
      keyMaterial: generated.keyMaterial,
      keyPairId: key.id,
      tagSet: tagSet(key.tags),
    };
  },

  async ImportKeyPair(params, ctx) {
    const keyName = requireString(params, 'KeyName');
    const { type, blob } = parseOpenSshPublicKey(requireString(params, 'PublicKeyMaterial'));
    const fingerprint =
      type === 'rsa'
        ? colonHex(createHash('md5').update(blob).digest())
        : createHash('sha256').update(blob).digest('base64').replace(/=+$/, '');

    const typeName = type === 'rsa' ? 'ssh-rsa' : 'ssh-ed25519';
    const key = await createKeyPairResource(
      ctx.store,
      keyName,
      { keyFingerprint: fingerprint, keyType: type, publicKey: `${typeName} ${blob.toString('base64')}` },
      params,
    );
    ctx.logger.info('Key pair imported', { keyPairId: key.id, keyName });
    return { keyName, keyFingerprint: fingerprint, keyPairId: key.id, tagSet: tagSet(key.tags) };
  },

  async DescribeKeyPairs(params, ctx) {
    const def = RESOURCE_TYPES['key-pair'];
    let keys = await ctx.store.list('key-pair');

    const names = getStringList(params, 'KeyName');
    for (const name of names) {
      if (!keys.some((key) => key.attributes.keyName === name)) throw keyPairNotFound(name);
    }
    const ids = getStringList(params, 'KeyPairId');
    for (const id of ids) {
      if (!keys.some((key) => key.id === id)) {
        throw new ServiceException(validationError(def.notFoundCode, `The key pair '${id}' does not exist`));
      }
    }
    if (names.length > 0) keys = keys.filter((key) => names.includes(attrString(key.attributes, 'keyName') ?? ''));
    if (ids.length > 0) keys = keys.filter((key) => ids.includes(key.id));

    const page = paginate(evaluateAll(keys, parseFilters(params), def.filters), params);
    const body: ValueMap = { keySet: page.items.map(renderKeyPair) };
    if (page.nextToken) body.nextToken = page.nextToken;
    return body;
  },

  async DeleteKeyPair(params, ctx) {
    const keyPairId = getString(params, 'KeyPairId');
    const keyName = getString(params, 'KeyName');
    if (!keyPairId && !keyName) {
      throw new ServiceException(validationError('MissingParameter', 'Either KeyName or KeyPairId must be specified'));
    }

    // Deleting a key pair that does not exist succeeds.
    const key = keyPairId ? await ctx.store.find(keyPairId) : await findKeyPairByName(ctx.store, keyName ?? '');
    const body: ValueMap = { return: true };
    if (key && key.type === 'key-pair') {
      await ctx.store.delete('key-pair', key.id);
      ctx.logger.info('Key pair deleted', { keyPairId: key.id });
      body.keyPairId = key.id;
    }
    return body;
  },
});
