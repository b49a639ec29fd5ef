/**
 * Basic Usage Example
 *
 * Walks through the binding against a real engine build:
 * - Loading the engine into a context
 * - Keys, signatures and agreement
 * - Pre-validation of untrusted input
 * - Disposal scopes
 * - Symmetric primitives
 * - Protocol stores
 *
 * Run with: SIGNAL_FFI_LIBRARY=/path/to/libsignal_ffi.so npx tsx examples/basic-usage.ts
 */

import * as crypto from 'crypto';
import {
  Aes256GcmSiv,
  IdentityKeyPair,
  IdentityTrustDecision,
  InMemoryIdentityKeyStore,
  LogLevel,
  NativeContext,
  PrivateKey,
  ProtocolAddress,
  PublicKey,
  SignalError,
  ValidationError,
  consoleSink,
  hkdf,
  withDisposalScope,
} from '../src/index.js';

async function main() {
  console.log('='.repeat(60));
  console.log('Signal Native Bridge Basic Usage Example');
  console.log('='.repeat(60));

  // ============================================================
  // 1. Loading the Engine
  // ============================================================
  console.log('\n1. Loading the Engine');
  console.log('-'.repeat(40));

  const context = NativeContext.load({ logger: consoleSink, logLevel: LogLevel.Info, errorMessages: true });
  console.log(`Context ready (max buffer: ${context.maxBufferSize} bytes)`);

  // ============================================================
  // 2. Keys and Signatures
  // ============================================================
  console.log('\n2. Keys and Signatures');
  console.log('-'.repeat(40));

  const identity = IdentityKeyPair.generate(context);
  const message = new TextEncoder().encode('hello');
  const signature = identity.privateKey.sign(message);

  console.log(`Identity key: ${Buffer.from(identity.publicKey.serialize()).toString('hex')}`);
  console.log(`  Signature length: ${signature.length}`);
  console.log(`  Verifies: ${identity.publicKey.verify(message, signature)}`);

  const alice = PrivateKey.generate(context);
  const bob = PrivateKey.generate(context);
  const shared = alice.agree(bob.getPublicKey());
  console.log(`  Shared secret: ${shared.length} bytes`);
  shared.dispose();

  // ============================================================
  // 3. Pre-validation
  // ============================================================
  console.log('\n3. Pre-validation');
  console.log('-'.repeat(40));

  // A serialized all-zero point never reaches the engine.
  const lowOrder = new Uint8Array(33);
  lowOrder[0] = 0x05;
  try {
    PublicKey.deserialize(context, lowOrder);
  } catch (error) {
    if (error instanceof ValidationError) {
      console.log(`  Rejected: ${error.reason} (${error.message})`);
    } else {
      throw error;
    }
  }

  // ============================================================
  // 4. Disposal Scopes
  // ============================================================
  console.log('\n4. Disposal Scopes');
  console.log('-'.repeat(40));

  const ephemeralSignature = withDisposalScope((scope) => {
    const key = scope.track(PrivateKey.generate(context));
    scope.onCleanup(() => console.log('  Cleanup callback executed!'));
    return key.sign(message);
  });
  console.log(`  Signed with a scoped key: ${ephemeralSignature.length} bytes`);

  // ============================================================
  // 5. Symmetric Primitives
  // ============================================================
  console.log('\n5. Symmetric Primitives');
  console.log('-'.repeat(40));

  const keyMaterial = hkdf(context, 32, crypto.randomBytes(32), new TextEncoder().encode('example'));
  const cipher = Aes256GcmSiv.create(context, keyMaterial.bytes);
  keyMaterial.dispose();

  const nonce = crypto.randomBytes(12);
  const ciphertext = cipher.encrypt(message, nonce);
  const plaintext = cipher.decrypt(ciphertext, nonce);
  console.log(`  Ciphertext: ${ciphertext.length} bytes`);
  console.log(`  Round trip: ${new TextDecoder().decode(plaintext.bytes)}`);
  plaintext.dispose();
  cipher.dispose();

  // ============================================================
  // 6. Identity Store
  // ============================================================
  console.log('\n6. Identity Store');
  console.log('-'.repeat(40));

  const store = new InMemoryIdentityKeyStore(context, identity, 1);
  const address = ProtocolAddress.create(context, 'bob', 1);
  const bobIdentity = bob.getPublicKey();

  console.log(`  First contact: ${await store.getTrustDecision(address, bobIdentity)}`);
  await store.saveIdentity(address, bobIdentity);
  const decision = await store.getTrustDecision(address, bobIdentity);
  console.log(`  After saving: ${decision} (${decision === IdentityTrustDecision.TRUSTED ? 'ok' : 'unexpected'})`);

  // Clean up
  await store.clear();
  for (const resource of [address, bobIdentity, alice, bob, identity]) {
    resource.dispose();
  }
  context.close();

  console.log('\n' + '='.repeat(60));
  console.log('Example complete!');
  console.log('='.repeat(60));
}

main().catch((error: unknown) => {
  console.error(error instanceof SignalError ? error.toString() : error);
  process.exitCode = 1;
});
