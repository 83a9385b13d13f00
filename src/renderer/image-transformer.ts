import type { ImageOverride } from '@/dtos/application.dto';
import type { ManifestObject } from '@/interfaces/manifest-object.interface';
import { isObject } from '@/utils/is-object';

type ImageReference = { name: string; tag?: string; digest?: string };

export const parseImage = (image: string): ImageReference => {
  const [withoutDigest, digest] = image.split('@', 2);
  const slash = withoutDigest.lastIndexOf('/');
  const colon = withoutDigest.lastIndexOf(':');
  if (colon > slash) {
    return { name: withoutDigest.slice(0, colon), tag: withoutDigest.slice(colon + 1), digest };
  }
  return { name: withoutDigest, digest };
};

export const formatImage = ({ name, tag, digest }: ImageReference): string =>
  `${name}${tag ? `:${tag}` : ''}${digest ? `@${digest}` : ''}`;

/** A digest pins the image and drops the tag; a new tag clears any previous digest. */
export const overrideImage = (image: string, override: ImageOverride): string => {
  const current = parseImage(image);
  const name = override.newName ?? current.name;
  if (override.digest) {
    return formatImage({ name, digest: override.digest });
  }
  if (override.newTag) {
    return formatImage({ name, tag: override.newTag });
  }
  return formatImage({ ...current, name });
};

const podSpecsOf = (object: Record<string, unknown>): Record<string, unknown>[] => {
  const specs: Record<string, unknown>[] = [];
  const spec = object.spec;
  if (!isObject(spec)) {
    return specs;
  }
  if (object.kind === 'Pod') {
    specs.push(spec);
  }
  const template = spec.template;
  if (isObject(template) && isObject(template.spec)) {
    specs.push(template.spec);
  }
  const jobTemplate = spec.jobTemplate;
  if (isObject(jobTemplate) && isObject(jobTemplate.spec) && isObject(jobTemplate.spec.template)) {
    const podTemplate = jobTemplate.spec.template;
    if (isObject(podTemplate.spec)) {
      specs.push(podTemplate.spec);
    }
  }
  return specs;
};

/** Rewrites container images in place; later overrides for the same image win. */
export const applyImageOverrides = (object: ManifestObject, overrides: readonly ImageOverride[]): void => {
  if (overrides.length === 0) {
    return;
  }
  for (const podSpec of podSpecsOf(object)) {
    for (const field of ['initContainers', 'containers']) {
      const containers = podSpec[field];
      if (!Array.isArray(containers)) {
        continue;
      }
      for (const container of containers) {
        if (!isObject(container) || typeof container.image !== 'string') {
          continue;
        }
        for (const override of overrides) {
          if (parseImage(container.image).name === override.name) {
            container.image = overrideImage(container.image, override);
          }
        }
      }
    }
  }
};
