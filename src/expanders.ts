/**
 * Registry of per-struct rules that say which pointers lead to further
 * blocks the tracer must visit.
 */
import type { Block } from './block.js';
import {
  CMP_NODE_R_LAYERS,
  COMPOSITING_NODE_GROUP_VERSION,
  IDP_ID,
  MODIFIER_TYPE,
  OB_DUPLICOLLECTION,
  PART_DRAW,
  SOCKET_TYPES_WITH_ID_VALUE,
  STRIP_TYPE,
} from './constants/scene-dna.js';
import { listbase, listbaseField, modifierType, modifiers, sequencerStrips } from './iterators.js';

export interface Expander {
  expand(block: Block): Iterable<Block>;
}

const expanders = new Map<string, Expander>();

/**
 * Registers the expander for blocks of struct `structName`, replacing any
 * earlier registration.
 */
export function registerExpander(structName: string, expander: Expander): void {
  expanders.set(structName, expander);
}

export function expanderFor(structName: string): Expander | undefined {
  return expanders.get(structName);
}

/** Blocks reachable from `block` through the expander of its struct. */
export function expandBlock(block: Block): Block[] {
  const expander = expanders.get(block.dnaTypeName);
  return expander ? Array.from(expander.expand(block)) : [];
}

function* pointers(block: Block, fields: readonly string[]): Generator<Block> {
  for (const field of fields) {
    const target = block.getBlock(field);
    if (target) {
      yield target;
    }
  }
}

function* animData(block: Block): Generator<Block> {
  const adt = block.getBlock('adt');
  if (adt) {
    yield* pointers(adt, ['action']);
  }
}

/** Materials assigned through the `totcol` / `**mat` pair. */
function* materials(block: Block): Generator<Block> {
  if (!block.hasField('totcol') || !block.hasField('mat')) {
    return;
  }
  for (const target of block.pointerArray('mat', block.getNumber('totcol'))) {
    if (target.kind === 'resolved') {
      yield target.block;
    }
  }
}

/** Textures and objects of the `mtex` slots found in old files. */
function* textureSlots(block: Block): Generator<Block> {
  if (!block.hasField('mtex')) {
    return;
  }
  const slots = block.fieldInfo('mtex').arrayLength;
  for (let index = 0; index < slots; index++) {
    const target = block.dereference('mtex', index);
    if (target.kind === 'resolved') {
      yield* pointers(target.block, ['tex', 'object']);
    }
  }
}

function* nodeTree(tree: Block): Generator<Block> {
  if (tree.dnaTypeName !== 'bNodeTree') {
    // Linked tree placeholder.
    yield tree;
    return;
  }
  if (!tree.hasField('nodes')) {
    return;
  }
  for (const node of listbaseField(tree, 'nodes')) {
    if (node.hasField('type') && node.getNumber('type') === CMP_NODE_R_LAYERS) {
      continue;
    }
    yield* pointers(node, ['id']);
    if (!node.hasField('inputs')) {
      continue;
    }
    for (const socket of listbaseField(node, 'inputs')) {
      if (!socket.hasField('type') || !SOCKET_TYPES_WITH_ID_VALUE.has(socket.getNumber('type'))) {
        continue;
      }
      const value = socket.getBlock('default_value');
      if (value) {
        yield* pointers(value, ['value']);
      }
    }
  }
}

/** The node tree embedded in (or linked from) a datablock. */
function* ownedNodeTree(block: Block): Generator<Block> {
  const { version, subversion } = COMPOSITING_NODE_GROUP_VERSION;
  const header = block.file.header;
  const field =
    header.version >= version && block.file.fileSubversion >= subversion && block.hasField('compositing_node_group')
      ? 'compositing_node_group'
      : 'nodetree';
  const tree = block.getBlock(field);
  if (tree) {
    yield* nodeTree(tree);
  }
}

/** Datablocks referenced from ID properties, as on geometry-nodes modifiers. */
function* idProperties(modifier: Block): Generator<Block> {
  const group = modifier.hasField(['settings', 'properties']) ? modifier.getBlock(['settings', 'properties']) : undefined;
  if (!group?.hasField(['data', 'group'])) {
    return;
  }
  for (const property of listbase(group.getBlock(['data', 'group', 'first']))) {
    if (property.hasField('type') && property.getNumber('type') === IDP_ID) {
      yield* pointers(property, ['data.pointer']);
    }
  }
}

function* modifierReferences(modifier: Block): Generator<Block> {
  switch (modifierType(modifier)) {
    case MODIFIER_TYPE.NODES:
      yield* idProperties(modifier);
      yield* pointers(modifier, ['node_group']);
      return;
    case MODIFIER_TYPE.MESH_SEQUENCE_CACHE:
      yield* pointers(modifier, ['cache_file']);
      return;
    default:
      return;
  }
}

registerExpander('Object', {
  *expand(block) {
    yield* animData(block);
    yield* materials(block);
    yield* pointers(block, ['data', 'proxy', 'proxy_group']);

    if (block.hasField('transflag') && (block.getNumber('transflag') & OB_DUPLICOLLECTION) !== 0) {
      yield* pointers(block, ['instance_collection', 'dup_group']);
    }

    const pose = block.getBlock('pose');
    if (pose?.hasField('chanbase')) {
      for (const channel of listbaseField(pose, 'chanbase')) {
        yield* pointers(channel, ['custom']);
      }
    }

    if (block.hasField('particlesystem')) {
      for (const system of listbaseField(block, 'particlesystem')) {
        yield* pointers(system, ['part']);
      }
    }

    if (block.hasField('modifiers')) {
      for (const modifier of modifiers(block)) {
        yield* modifierReferences(modifier);
      }
    }
  },
});

registerExpander('Mesh', {
  *expand(block) {
    yield* animData(block);
    yield* materials(block);
    yield* pointers(block, ['texcomesh']);
  },
});

registerExpander('Curve', {
  *expand(block) {
    yield* animData(block);
    yield* materials(block);
    yield* pointers(block, ['vfont', 'vfontb', 'vfonti', 'vfontbi', 'bevobj', 'taperobj', 'textoncurve']);
  },
});

const collection: Expander = {
  *expand(block) {
    if (block.hasField('gobject')) {
      for (const item of listbaseField(block, 'gobject')) {
        yield* pointers(item, ['ob']);
      }
    }
    if (block.hasField('children')) {
      for (const child of listbaseField(block, 'children')) {
        yield* pointers(child, ['collection']);
      }
    }
  },
};
registerExpander('Collection', collection);
registerExpander('Group', collection);

const light: Expander = {
  *expand(block) {
    yield* animData(block);
    yield* ownedNodeTree(block);
    yield* textureSlots(block);
  },
};
registerExpander('Light', light);
registerExpander('Lamp', light);

registerExpander('Material', {
  *expand(block) {
    yield* animData(block);
    yield* ownedNodeTree(block);
    yield* textureSlots(block);
    yield* pointers(block, ['group']);
  },
});

registerExpander('MetaBall', {
  *expand(block) {
    yield* animData(block);
    yield* materials(block);
  },
});

registerExpander('bArmature', {
  expand: animData,
});

registerExpander('bNodeTree', {
  *expand(block) {
    yield* animData(block);
    yield* nodeTree(block);
  },
});

registerExpander('ParticleSettings', {
  *expand(block) {
    yield* animData(block);
    yield* textureSlots(block);
    if (!block.hasField('ren_as')) {
      return;
    }
    const renderAs = block.getNumber('ren_as');
    if (renderAs === PART_DRAW.GR) {
      yield* pointers(block, ['instance_collection', 'dup_group']);
    } else if (renderAs === PART_DRAW.OB) {
      yield* pointers(block, ['instance_object', 'dup_ob']);
    }
  },
});

/** Strip types whose datablock pointer is worth following, and the field holding it. */
const STRIP_POINTER_FIELDS: ReadonlyMap<number, string> = new Map([
  [STRIP_TYPE.SCENE, 'scene'],
  [STRIP_TYPE.MOVIECLIP, 'clip'],
  [STRIP_TYPE.MASK, 'mask'],
  [STRIP_TYPE.SOUND_RAM, 'sound'],
]);

registerExpander('Scene', {
  *expand(block) {
    yield* animData(block);
    yield* ownedNodeTree(block);
    yield* pointers(block, ['camera', 'world', 'set', 'clip', 'master_collection']);

    if (block.hasField('base')) {
      for (const base of listbaseField(block, 'base')) {
        yield* pointers(base, ['object']);
      }
    }

    const editing = block.getBlock('ed');
    if (!editing) {
      return;
    }
    for (const { strip, type } of sequencerStrips(editing)) {
      const field = STRIP_POINTER_FIELDS.get(type);
      if (field) {
        yield* pointers(strip, [field]);
      }
    }
  },
});

registerExpander('Tex', {
  *expand(block) {
    yield* animData(block);
    yield* ownedNodeTree(block);
    yield* pointers(block, ['ima']);
  },
});

registerExpander('World', {
  *expand(block) {
    yield* animData(block);
    yield* ownedNodeTree(block);
    yield* textureSlots(block);
  },
});
