/**
 * @format
 * Tagging Aspect
 *
 * Applies the mandatory tag set to every taggable resource. The per-resource
 * Name tag is set by the constructs themselves.
 */

import * as cdk from 'aws-cdk-lib/core';

import { IConstruct } from 'constructs';

import { TagConfig, buildResourceTags } from '../utilities/tags';

/** Tag configuration for a whole app or stack (no per-resource Name) */
export type AppTagConfig = Omit<TagConfig, 'name'>;

/**
 * Aspect that applies consistent tags to all taggable resources.
 * Uses direct tag manager manipulation to avoid priority conflicts.
 */
export class TaggingAspect implements cdk.IAspect {
    private readonly tags: Record<string, string>;

    constructor(config: AppTagConfig) {
        this.tags = buildResourceTags(config);
    }

    public visit(node: IConstruct): void {
        if (cdk.TagManager.isTaggable(node)) {
            Object.entries(this.tags).forEach(([key, value]) => {
                node.tags.setTag(key, value);
            });
        }
    }
}

/**
 * Apply the tag set with Tags.of(), for scopes where an aspect is not wanted
 */
export function applyTagging(scope: IConstruct, config: AppTagConfig): void {
    Object.entries(buildResourceTags(config)).forEach(([key, value]) => {
        cdk.Tags.of(scope).add(key, value);
    });
}
