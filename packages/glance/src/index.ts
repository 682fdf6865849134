/**
 * @image-sync/glance
 *
 * ImageStore implementation for OpenStack Glance v2 with Keystone v3 auth.
 */

export { GlanceImageStore, type GlanceImageStoreConfig } from './glance-store'
export { KeystoneTokenProvider, type KeystoneConfig } from './keystone'
export { createGlanceStore, serviceEndpoint } from './factory'
export { glanceImageSchema, toImageRecord } from './image-schema'
