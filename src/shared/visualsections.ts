/**
 * @file visualsections.ts
 * Extractors for visual elements: props and their animations, flexbodies,
 * flares, managed materials, submeshes, cameras and sound sources
 */

import { BUILTIN } from './defaults';
import { ErrorCodes } from './diagnostics';
import { Keyword } from './keywords';
import { splitPayload } from './lexer';
import { NodeRange, NodeRef } from './noderef';
import { OptionTable } from './optionparsing';
import { LineHandler, ParserContext, scanInt } from './parsercontext';
import {
    Animation,
    AnimationMode,
    AnimationSource,
    CabOption,
    CameraSettings,
    Flare,
    FlareType,
    ManagedMaterial,
    ManagedMaterialType,
    MotorSource,
    MotorSourceKind,
    Prop,
    PropSpecial,
    SoundSourceMode,
    vec3,
} from './rigdef';

//#region Staged Blocks

/**
 * Move staged sub-blocks into the active module. The submesh is kept
 * staged when `keepSubmesh` is set (its child sections are opening).
 */
export function flushStagedBlocks(ctx: ParserContext, keepSubmesh: boolean = false): void {
    if (ctx.stagedSubmesh && !keepSubmesh) {
        ctx.module.submeshes.push(ctx.stagedSubmesh);
        ctx.stagedSubmesh = null;
    }

    if (ctx.stagedCameraRail) {
        if (ctx.stagedCameraRail.nodes.length === 0) {
            ctx.warning("Empty section 'camerarail', ignoring...", ErrorCodes.STRUCTURAL);
        } else {
            ctx.module.cameraRails.push(ctx.stagedCameraRail);
        }
        ctx.stagedCameraRail = null;
    }
}

export const parseDirectiveSubmesh: LineHandler = (ctx) => {
    flushStagedBlocks(ctx);
    ctx.currentBlock = null;
    ctx.stagedSubmesh = { backmesh: false, texcoords: [], cabTriangles: [] };
};

export const parseDirectiveBackmesh: LineHandler = (ctx) => {
    if (ctx.stagedSubmesh) {
        ctx.stagedSubmesh.backmesh = true;
    } else {
        ctx.error("must come after 'submesh'", ErrorCodes.STRUCTURAL);
    }
};

export const parseTexcoords: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(3)) { return; }
    if (!ctx.stagedSubmesh) {
        ctx.error("'texcoords' must come after 'submesh', skipping line", ErrorCodes.STRUCTURAL);
        return;
    }

    ctx.stagedSubmesh.texcoords.push({
        node: ctx.getArgNodeRef(0),
        u: ctx.getArgFloat(1),
        v: ctx.getArgFloat(2),
    });
};

const CAB_OPTIONS: OptionTable = {
    n: 0,
    c: CabOption.Contact,
    b: CabOption.Buoyant,
    D: CabOption.Contact | CabOption.Buoyant,
    p: CabOption.Tougher10x,
    u: CabOption.Invulnerable,
    F: CabOption.Tougher10x | CabOption.Buoyant,
    S: CabOption.Invulnerable | CabOption.Buoyant,
};

export const parseCab: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(3)) { return; }
    if (!ctx.stagedSubmesh) {
        ctx.error("'cab' must come after 'submesh', skipping line", ErrorCodes.STRUCTURAL);
        return;
    }

    ctx.stagedSubmesh.cabTriangles.push({
        nodes: [ctx.getArgNodeRef(0), ctx.getArgNodeRef(1), ctx.getArgNodeRef(2)],
        options: ctx.numArgs > 3
            ? ctx.foldOptions(ctx.getArgStr(3), CAB_OPTIONS, c => `ignoring invalid option '${c}'`)
            : 0,
    });
};

export const parseCameraRail: LineHandler = (ctx) => {
    if (!ctx.stagedCameraRail) {
        ctx.stagedCameraRail = { nodes: [] };
    }
    ctx.stagedCameraRail.nodes.push(ctx.getArgNodeRef(0));
};

//#endregion

//#region Props and Animations

const DEFAULT_DASHBOARD_ROTATION = 160;

function detectPropSpecial(meshName: string): PropSpecial {
    if (meshName.includes('leftmirror')) { return PropSpecial.MirrorLeft; }
    if (meshName.includes('rightmirror')) { return PropSpecial.MirrorRight; }
    if (meshName.includes('dashboard-rh')) { return PropSpecial.DashboardRight; }
    if (meshName.includes('dashboard')) { return PropSpecial.DashboardLeft; }

    const lower = meshName.toLowerCase();
    // 'seat2' must be tested before its prefix 'seat'
    const prefixes: PropSpecial[] = [
        PropSpecial.AeroPropSpin,
        PropSpecial.AeroPropBlade,
        PropSpecial.DriverSeat2,
        PropSpecial.DriverSeat,
        PropSpecial.Beacon,
        PropSpecial.RedBeacon,
        PropSpecial.Lightbar,
    ];
    return prefixes.find(p => lower.startsWith(p)) ?? PropSpecial.None;
}

export const parseProps: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(10)) { return; }

    const prop: Prop = {
        referenceNode: ctx.getArgNodeRef(0),
        xAxisNode: ctx.getArgNodeRef(1),
        yAxisNode: ctx.getArgNodeRef(2),
        offset: vec3(ctx.getArgFloat(3), ctx.getArgFloat(4), ctx.getArgFloat(5)),
        rotation: vec3(ctx.getArgFloat(6), ctx.getArgFloat(7), ctx.getArgFloat(8)),
        meshName: ctx.getArgStr(9),
        special: PropSpecial.None,
        animations: [],
        cameraSettings: { mode: 'always' },
    };
    prop.special = detectPropSpecial(prop.meshName);

    const isDashboard = prop.special === PropSpecial.DashboardLeft || prop.special === PropSpecial.DashboardRight;
    if (prop.special === PropSpecial.Beacon && ctx.numArgs >= 14) {
        prop.beacon = {
            flareMaterialName: ctx.getArgStr(10).trim(),
            color: [ctx.getArgFloat(11), ctx.getArgFloat(12), ctx.getArgFloat(13)],
        };
    } else if (isDashboard) {
        prop.dashboard = {
            meshName: ctx.numArgs > 10 ? ctx.getArgStr(10) : '',
            rotationAngle: DEFAULT_DASHBOARD_ROTATION,
        };
        if (ctx.numArgs > 13) {
            prop.dashboard.offset = vec3(ctx.getArgFloat(11), ctx.getArgFloat(12), ctx.getArgFloat(13));
        }
        if (ctx.numArgs > 14) {
            prop.dashboard.rotationAngle = ctx.getArgFloat(14);
        }
    }
    ctx.module.props.push(prop);
};

/**
 * Parse a camera mode argument: a cinecam index, -1 (external) or -2 (always).
 * Returns null for any other value.
 */
function parseCameraSettings(ctx: ParserContext, text: string): CameraSettings | null {
    const input = ctx.parseArgInt(text);
    if (input >= 0) {
        return { mode: 'cinecam', cinecamIndex: input };
    }
    if (input === -1) {
        return { mode: 'external' };
    }
    if (input === -2) {
        return { mode: 'always' };
    }
    ctx.error(`invalid value (${input}), skipping line`, ErrorCodes.INVALID_VALUE);
    return null;
}

export const parseDirectivePropCameraMode: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(2)) { return; }

    const prop = ctx.module.props.at(-1);
    if (!prop) {
        ctx.error("'prop_camera_mode' must come after a prop, skipping line", ErrorCodes.STRUCTURAL);
        return;
    }
    const settings = parseCameraSettings(ctx, ctx.getArgStr(1));
    if (settings) {
        prop.cameraSettings = settings;
    }
};

const ANIMATION_FLAGS: Readonly<Record<string, AnimationMode>> = {
    autoanimate: AnimationMode.AutoAnimate,
    noflip: AnimationMode.NoFlip,
    bounce: AnimationMode.Bounce,
    eventlock: AnimationMode.EventLock,
};

const ANIMATION_MODES: Readonly<Record<string, AnimationMode>> = {
    'x-rotation': AnimationMode.RotationX,
    'y-rotation': AnimationMode.RotationY,
    'z-rotation': AnimationMode.RotationZ,
    'x-offset': AnimationMode.OffsetX,
    'y-offset': AnimationMode.OffsetY,
    'z-offset': AnimationMode.OffsetZ,
};

function lookup<T>(table: Readonly<Record<string, T>>, key: string): T | undefined {
    return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}

function parseMotorSource(ctx: ParserContext, value: string): MotorSource | null {
    const kind = Object.values(MotorSourceKind).find(p => value.startsWith(p));
    if (!kind) {
        return null;
    }
    return { source: kind, motor: ctx.parseArgUint(value.substring(kind.length)) };
}

/**
 * Apply one `add_animation` attribute token. Returns a description of the
 * problem, or null when the token was accepted.
 */
function applyAnimationToken(ctx: ParserContext, animation: Animation, token: string): string | null {
    const entry = token.split(':').map(s => s.trim());

    if (entry.length === 1) {
        const flag = lookup(ANIMATION_FLAGS, entry[0]);
        if (flag === undefined) {
            return `Invalid keyword: ${entry[0]}`;
        }
        animation.mode |= flag;
        return null;
    }
    if (entry.length !== 2) {
        return `Invalid item: ${entry[0]}, ignoring...`;
    }

    const [key, rawValue] = entry;
    const values = rawValue.split('|').map(v => v.trim());
    switch (key) {
        case 'mode': {
            let problem: string | null = null;
            for (const value of values) {
                const mode = lookup(ANIMATION_MODES, value);
                if (mode === undefined) {
                    problem = `Invalid 'mode': ${value}, ignoring...`;
                } else {
                    animation.mode |= mode;
                }
            }
            return problem;
        }
        case 'event':
            animation.event = rawValue.toUpperCase();
            return null;
        case 'source': {
            let problem: string | null = null;
            for (const value of values) {
                const source = Object.values(AnimationSource).find(s => s === value);
                if (source) {
                    animation.sources.add(source);
                    continue;
                }
                const motor = parseMotorSource(ctx, value);
                if (motor) {
                    animation.motorSources.push(motor);
                } else {
                    problem = `Invalid 'source': ${value}, ignoring...`;
                }
            }
            return problem;
        }
        default:
            return `Invalid keyword: ${key}, ignoring...`;
    }
}

export const parseDirectiveAddAnimation: LineHandler = (ctx) => {
    const tokens = splitPayload(ctx.line, Keyword.ADD_ANIMATION.length, ',');
    ctx.numArgs = tokens.length;
    if (!ctx.checkNumArguments(4)) { return; }

    const prop = ctx.module.props.at(-1);
    if (!prop) {
        ctx.error("'add_animation' must come after a prop, skipping line", ErrorCodes.STRUCTURAL);
        return;
    }

    const animation: Animation = {
        ratio: ctx.parseArgFloat(tokens[0]),
        lowerLimit: ctx.parseArgFloat(tokens[1]),
        upperLimit: ctx.parseArgFloat(tokens[2]),
        mode: 0,
        sources: new Set<AnimationSource>(),
        motorSources: [],
        event: '',
    };
    for (const token of tokens.slice(3)) {
        const problem = applyAnimationToken(ctx, animation, token);
        if (problem) {
            ctx.warning(`Ignoring invalid token '${token.trim()}' (${problem})`, ErrorCodes.UNKNOWN_ATTRIBUTE);
        }
    }
    prop.animations.push(animation);
};

//#endregion

//#region Flexbodies

export const parseFlexbodies: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(10)) { return; }

    ctx.module.flexbodies.push({
        referenceNode: ctx.getArgNodeRef(0),
        xAxisNode: ctx.getArgNodeRef(1),
        yAxisNode: ctx.getArgNodeRef(2),
        offset: vec3(ctx.getArgFloat(3), ctx.getArgFloat(4), ctx.getArgFloat(5)),
        rotation: vec3(ctx.getArgFloat(6), ctx.getArgFloat(7), ctx.getArgFloat(8)),
        meshName: ctx.getArgStr(9),
        nodeListToImport: [],
        cameraSettings: { mode: 'always' },
    });
};

export const parseDirectiveFlexbodyCameraMode: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(2)) { return; }

    const flexbody = ctx.module.flexbodies.at(-1);
    if (!flexbody) {
        ctx.error("'flexbody_camera_mode' must come after a flexbody, skipping line", ErrorCodes.STRUCTURAL);
        return;
    }
    const settings = parseCameraSettings(ctx, ctx.getArgStr(1));
    if (settings) {
        flexbody.cameraSettings = settings;
    }
};

/** Reference used by `forset`; always numeric */
function forsetRef(ctx: ParserContext, text: string): NodeRef {
    const trimmed = text.trim();
    const scanned = scanInt(trimmed);
    const digits = scanned ? trimmed.substring(0, scanned.consumed) : '';
    return new NodeRef(digits, Math.abs(scanned?.value ?? 0), ctx.lineNumber, true, false);
}

export const parseDirectiveForset: LineHandler = (ctx) => {
    const flexbody = ctx.module.flexbodies.at(-1);
    if (!flexbody) {
        ctx.error("'forset' must come after a flexbody, skipping line", ErrorCodes.STRUCTURAL);
        return;
    }

    for (const item of splitPayload(ctx.line, Keyword.FORSET.length, ',')) {
        const hyphen = item.indexOf('-');
        let range: NodeRange;
        if (hyphen === -1) {
            const ref = forsetRef(ctx, item);
            range = { start: ref, end: ref };
        } else {
            range = {
                start: forsetRef(ctx, item.substring(0, hyphen)),
                end: forsetRef(ctx, item.substring(hyphen + 1)),
            };
        }
        flexbody.nodeListToImport.push(range);
    }
};

//#endregion

//#region Flares and Materials

export const parseFlares: LineHandler = (ctx) => {
    const isFlares2 = ctx.currentBlock === Keyword.FLARES2;
    if (!ctx.checkNumArguments(isFlares2 ? 6 : 5)) { return; }

    let pos = 0;
    const flare: Flare = {
        referenceNode: ctx.getArgNodeRef(pos++),
        nodeAxisX: ctx.getArgNodeRef(pos++),
        nodeAxisY: ctx.getArgNodeRef(pos++),
        offset: vec3(ctx.getArgFloat(pos++), ctx.getArgFloat(pos++), 1),
        type: FlareType.Headlight,
        controlNumber: -1,
        dashboardLink: '',
        blinkDelayMs: -2,
        size: -1,
        materialName: '',
    };
    if (isFlares2) {
        flare.offset.z = ctx.getArgFloat(pos++);
    }

    if (ctx.numArgs > pos) { flare.type = ctx.getArgFlareType(pos++); }
    if (ctx.numArgs > pos) {
        if (flare.type === FlareType.User) {
            flare.controlNumber = ctx.getArgInt(pos);
        } else if (flare.type === FlareType.Dashboard) {
            flare.dashboardLink = ctx.getArgStr(pos);
        }
        pos++;
    }
    if (ctx.numArgs > pos) { flare.blinkDelayMs = ctx.getArgInt(pos++); }
    if (ctx.numArgs > pos) { flare.size = ctx.getArgFloat(pos++); }
    if (ctx.numArgs > pos) { flare.materialName = ctx.getArgStr(pos++); }

    ctx.module.flares.push(flare);
};

export const parseMaterialFlareBindings: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(2)) { return; }

    ctx.module.materialFlareBindings.push({
        flareNumber: ctx.getArgInt(0),
        materialName: ctx.getArgStr(1),
    });
};

function isManagedMaterialType(text: string): text is ManagedMaterialType {
    return Object.values(ManagedMaterialType).some(t => t === text);
}

export const parseManagedMaterials: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(2)) { return; }

    const type = ctx.getArgStr(1);
    if (!isManagedMaterialType(type)) {
        ctx.warning(`${type} is an unknown effect`, ErrorCodes.INVALID_VALUE);
        return;
    }
    if (!ctx.checkNumArguments(3)) { return; }

    const material: ManagedMaterial = {
        name: ctx.getArgStr(0),
        type,
        diffuseMap: ctx.getArgStr(2),
        damagedDiffuseMap: '',
        specularMap: '',
        options: ctx.defaults.managedMaterials,
    };
    if (type === ManagedMaterialType.MeshStandard || type === ManagedMaterialType.MeshTransparent) {
        if (ctx.numArgs > 3) { material.specularMap = ctx.getArgManagedTex(3); }
    } else {
        if (ctx.numArgs > 3) { material.damagedDiffuseMap = ctx.getArgManagedTex(3); }
        if (ctx.numArgs > 4) { material.specularMap = ctx.getArgManagedTex(4); }
    }

    for (const field of ['diffuseMap', 'damagedDiffuseMap', 'specularMap'] as const) {
        const texture = material[field];
        if (texture.length > 0 && !ctx.resourceExists(texture)) {
            ctx.warning(`Missing texture file: ${texture}`, ErrorCodes.RESOURCE_MISSING);
            material[field] = '';
        }
    }
    ctx.module.managedMaterials.push(material);
};

//#endregion

//#region Cameras, Particles and Sounds

export const parseExhausts: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(2)) { return; }

    // Argument [2] is unused
    ctx.module.exhausts.push({
        referenceNode: ctx.getArgNodeRef(0),
        directionNode: ctx.getArgNodeRef(1),
        particleName: ctx.numArgs > 3 ? ctx.getArgStr(3) : '',
    });
};

export const parseParticles: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(3)) { return; }

    ctx.module.particles.push({
        emitterNode: ctx.getArgNodeRef(0),
        referenceNode: ctx.getArgNodeRef(1),
        particleSystemName: ctx.getArgStr(2),
    });
};

export const parseVideoCamera: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(19)) { return; }

    ctx.module.videoCameras.push({
        referenceNode: ctx.getArgNodeRef(0),
        leftNode: ctx.getArgNodeRef(1),
        bottomNode: ctx.getArgNodeRef(2),
        altReferenceNode: ctx.getArgNullableNode(3),
        altOrientationNode: ctx.getArgNullableNode(4),
        offset: vec3(ctx.getArgFloat(5), ctx.getArgFloat(6), ctx.getArgFloat(7)),
        rotation: vec3(ctx.getArgFloat(8), ctx.getArgFloat(9), ctx.getArgFloat(10)),
        fieldOfView: ctx.getArgFloat(11),
        textureWidth: ctx.getArgInt(12),
        textureHeight: ctx.getArgInt(13),
        minClipDistance: ctx.getArgFloat(14),
        maxClipDistance: ctx.getArgFloat(15),
        cameraRole: ctx.getArgInt(16),
        cameraMode: ctx.getArgInt(17),
        materialName: ctx.getArgStr(18),
        cameraName: ctx.numArgs > 19 ? ctx.getArgStr(19) : '',
    });
};

export const parseCameras: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(3)) { return; }

    ctx.module.cameras.push({
        centerNode: ctx.getArgNodeRef(0),
        backNode: ctx.getArgNodeRef(1),
        leftNode: ctx.getArgNodeRef(2),
    });
};

export const parseSoundSources: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(2)) { return; }

    ctx.module.soundSources.push({
        node: ctx.getArgNodeRef(0),
        soundScriptName: ctx.getArgStr(1),
    });
};

export const parseSoundSources2: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(3)) { return; }

    let mode = ctx.getArgInt(1);
    if (mode < -2) {
        ctx.error(`invalid mode ${mode}, falling back to default -2`, ErrorCodes.INVALID_VALUE);
        mode = -2;
    }
    let soundMode: SoundSourceMode;
    if (mode >= 0) {
        soundMode = { mode: 'cinecam', cinecamIndex: mode };
    } else {
        soundMode = mode === -1 ? { mode: 'outside' } : { mode: 'always' };
    }

    ctx.module.soundSources2.push({
        node: ctx.getArgNodeRef(0),
        soundScriptName: ctx.getArgStr(2),
        mode: soundMode,
    });
};

export const parseSetSkeletonSettings: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(2)) { return; }

    const skeleton = ctx.module.skeletonSettings ?? {
        visibilityRangeMeters: BUILTIN.SKELETON_VISIBILITY_RANGE,
        beamThicknessMeters: BUILTIN.SKELETON_DIAMETER,
    };
    skeleton.visibilityRangeMeters = ctx.getArgFloat(1);
    if (ctx.numArgs > 2) { skeleton.beamThicknessMeters = ctx.getArgFloat(2); }

    if (skeleton.visibilityRangeMeters < 0) { skeleton.visibilityRangeMeters = BUILTIN.SKELETON_VISIBILITY_RANGE; }
    if (skeleton.beamThicknessMeters < 0) { skeleton.beamThicknessMeters = BUILTIN.SKELETON_DIAMETER; }
    ctx.module.skeletonSettings = skeleton;
};

export const parseExtCamera: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(2)) { return; }

    const mode = ctx.getArgStr(1);
    if (mode === 'classic') {
        ctx.module.extCamera = { mode: 'classic' };
    } else if (mode === 'cinecam') {
        ctx.module.extCamera = { mode: 'cinecam' };
    } else if (mode === 'node' && ctx.numArgs > 2) {
        ctx.module.extCamera = { mode: 'node', node: ctx.getArgNodeRef(2) };
    } else if (!ctx.module.extCamera) {
        ctx.module.extCamera = { mode: 'classic' };
    }
};

export const parseSubmeshGroundModel: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(2)) { return; }

    ctx.module.submeshGroundModel.push(ctx.getArgStr(1));
};

//#endregion
