import crypto, { randomUUID } from 'node:crypto'
import path from 'node:path'
import { nanoid } from 'nanoid'
import { ValidationError } from '../plumbing/errors.ts'
import type { Credential, Protocol } from './types/account.ts'
import type { CreateAccountInput, IssuedCredential } from './types/requests.ts'

const GENERATED_SECRET_LENGTH = 16

export interface PasswordHash {
  hash: string
  salt: string
}

/**
 * Hash a password using Node.js crypto scrypt with nanoid-generated salt.
 * Only the hash is stored; the plaintext goes to the daemon once.
 */
export const hashPassword = (password: string): Promise<PasswordHash> => {
  return new Promise((resolve, reject) => {
    const salt = nanoid()

    crypto.scrypt(password, salt, 64, (err, derivedKey) => {
      if (err) {
        reject(err)
        return
      }

      resolve({
        hash: derivedKey.toString('hex'),
        salt,
      })
    })
  })
}

export const generateSecret = (): string => nanoid(GENERATED_SECRET_LENGTH)

export interface CredentialIssue {
  credential: Credential
  issued: IssuedCredential
}

export const defaultCertificatePath = (
  certificateDir: string,
  id: string,
): string => path.join(certificateDir, `${id}.crt`)

/**
 * Build the stored credential for a new account, plus the secret material
 * that is shown to the operator once.
 */
export const issueCredential = async (
  input: Pick<
    CreateAccountInput,
    'id' | 'protocol' | 'password' | 'uuid' | 'certificatePath'
  >,
  certificateDir: string,
): Promise<CredentialIssue> => {
  switch (input.protocol) {
    case 'ssh': {
      const password = input.password ?? generateSecret()
      const { hash, salt } = await hashPassword(password)
      return {
        credential: { kind: 'password-hash', hash, salt },
        issued: { password },
      }
    }
    case 'vmess':
    case 'vless': {
      const uuid = input.uuid ?? randomUUID()
      return {
        credential: { kind: 'uuid', uuid },
        issued: { uuid },
      }
    }
    case 'trojan':
    case 'l2tp': {
      const secret = input.password ?? generateSecret()
      return {
        credential: { kind: 'secret', secret },
        issued: { password: secret },
      }
    }
    case 'openvpn': {
      const certificatePath =
        input.certificatePath ?? defaultCertificatePath(certificateDir, input.id)
      return {
        credential: {
          kind: 'certificate',
          commonName: input.id,
          certificatePath,
        },
        issued: { certificatePath },
      }
    }
  }
}

/**
 * Fresh credential for an existing account. OpenVPN certificates come from
 * the external CA tool, so they cannot be rotated here.
 */
export const rotateCredential = async (
  id: string,
  protocol: Protocol,
  certificateDir: string,
): Promise<CredentialIssue> => {
  if (protocol === 'openvpn') {
    throw new ValidationError(
      'OpenVPN credentials are certificates; reissue them with the CA tool',
    )
  }
  return issueCredential({ id, protocol }, certificateDir)
}
