/**
 * Flag and enum values stored in scene file structs.
 * Layouts come from each file's own table; only these values are fixed.
 */

/** Image.source */
export const IMAGE_SOURCE = {
  FILE: 1,
  SEQUENCE: 2,
  MOVIE: 3,
  GENERATED: 4,
  VIEWER: 5,
  TILED: 6,
} as const;

/** MovieClip.source */
export const MOVIE_CLIP_SOURCE = {
  SEQUENCE: 1,
  MOVIE: 2,
} as const;

/** Object.transflag bit: instances a collection. */
export const OB_DUPLICOLLECTION = 1 << 8;

/** ParticleSettings.ren_as */
export const PART_DRAW = {
  OB: 7,
  GR: 8,
} as const;

/** ModifierData.type */
export const MODIFIER_TYPE = {
  OCEAN: 39,
  MESH_CACHE: 46,
  MESH_SEQUENCE_CACHE: 52,
  FLUID: 56,
  NODES: 57,
} as const;

/** FluidModifierData.type bit for domain settings. */
export const FLUID_TYPE_DOMAIN = 1 << 0;

/** Strip.type */
export const STRIP_TYPE = {
  IMAGE: 0,
  META: 1,
  SCENE: 2,
  MOVIE: 3,
  SOUND_RAM: 4,
  SOUND_HD: 5,
  MOVIECLIP: 6,
  MASK: 7,
} as const;

/** bNodeSocket.type values whose default value points at a datablock. */
export const SOCKET_TYPES_WITH_ID_VALUE: ReadonlySet<number> = new Set([
  8, // object
  9, // image
  11, // collection
  12, // texture
  13, // material
]);

/** bNode.type of the compositor render-layers node; its id is the owning scene. */
export const CMP_NODE_R_LAYERS = 221;

/** IDProperty.type for a datablock pointer. */
export const IDP_ID = 9;

/** First file version whose scenes store the compositor tree as `compositing_node_group`. */
export const COMPOSITING_NODE_GROUP_VERSION = { version: 500, subversion: 4 } as const;

/** Block codes with a fixed meaning. */
export const BLOCK_CODE = {
  SCENE: 'SC',
  LIBRARY: 'LI',
  ID_PLACEHOLDER: 'ID',
  DATA: 'DATA',
  GLOBAL: 'GLOB',
} as const;
