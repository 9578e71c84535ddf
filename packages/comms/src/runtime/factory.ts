import type { AllContributions, AllRequirements, Feature } from './framework/feature.js';

/** A set of initialized features and the function that tears them down. */
export type BuiltNode<TFeatures extends readonly Feature<object, object>[]> =
  AllContributions<TFeatures> extends AllRequirements<TFeatures>
    ? { capability: AllContributions<TFeatures>; close: (error?: Error) => Promise<void> }
    : { readonly __error: "A feature's requirement was not met by the provided contributions. Please check the feature list." };

/**
 * Assembles features into one endpoint node.
 *
 * The return type resolves to an error object when the contributions do not
 * satisfy every requirement, so a missing feature fails to compile.
 *
 * @example
 * ```ts
 * const node = await buildFeatures([new FeatureA(), new FeatureB()] as const);
 * await node.close();
 * ```
 */
export async function buildFeatures<const TFeatures extends readonly Feature<object, object>[]>(
  features: TFeatures,
): Promise<BuiltNode<TFeatures>> {
  const contributions: object[] = [];
  const capability: Record<string, unknown> = {};

  for (const feature of features) {
    const contribution = feature.contribute();
    contributions.push(contribution);
    Object.assign(capability, contribution);
  }

  for (const feature of features) {
    await feature.init(capability);
  }

  let closed = false;
  const close = async (error?: Error) => {
    if (closed) return;
    closed = true;
    for (let i = features.length - 1; i >= 0; i--) {
      try {
        await features[i].close(contributions[i], error);
      } catch (e) {
        console.error(`[comms] Error closing feature [${i}]:`, e);
      }
    }
  };

  // TypeScript cannot resolve the conditional return type inside the body;
  // the signature's check is what makes this safe.
  return { capability, close } as unknown as BuiltNode<TFeatures>;
}
