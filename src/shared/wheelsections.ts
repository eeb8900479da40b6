/**
 * @file wheelsections.ts
 * Extractors for wheels and the driveline: wheel variants, axles,
 * transfer case, brakes and driving aids
 */

import { ErrorCodes } from './diagnostics';
import { Keyword } from './keywords';
import { splitPayload } from './lexer';
import { NodeRef } from './noderef';
import { applyControlModeToken, ControlModeAttributes, DEFAULT_CONTROL_MODE } from './optionparsing';
import { LineHandler, ParserContext } from './parsercontext';
import { Axle, DifferentialType, FlexBodyWheel, MeshWheel, TransferCase, Wheel, Wheel2 } from './rigdef';
import { GeneratedNodeOwner } from './sequentialimporter';

//#region Wheels

/** Nodes generated per ray, by wheel section */
const NODES_PER_RAY: Partial<Record<Keyword, number>> = {
    [Keyword.WHEELS]: 2,
    [Keyword.WHEELS2]: 4,
    [Keyword.MESHWHEELS]: 2,
    [Keyword.MESHWHEELS2]: 2,
    [Keyword.FLEXBODYWHEELS]: 4,
};

function generateWheelNodes(ctx: ParserContext, keyword: Keyword, numRays: number, owner: GeneratedNodeOwner): void {
    if (!ctx.importer.isEnabled) {
        return;
    }
    const perRay = NODES_PER_RAY[keyword] ?? 0;
    ctx.importer.addGeneratedNodes(Math.max(0, numRays) * perRay, owner);
}

export const parseWheels: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(14)) { return; }

    const wheel: Wheel = {
        radius: ctx.getArgFloat(0),
        width: ctx.getArgFloat(1),
        numRays: ctx.getArgInt(2),
        nodes: [ctx.getArgNodeRef(3), ctx.getArgNodeRef(4)],
        rigidityNode: ctx.getArgRigidityNode(5),
        braking: ctx.getArgBraking(6),
        propulsion: ctx.getArgPropulsion(7),
        referenceArmNode: ctx.getArgNodeRef(8),
        mass: ctx.getArgFloat(9),
        springiness: ctx.getArgFloat(10),
        damping: ctx.getArgFloat(11),
        faceMaterialName: ctx.getArgStr(12),
        bandMaterialName: ctx.getArgStr(13),
        nodeDefaults: ctx.defaults.node,
        beamDefaults: ctx.defaults.beam,
    };
    generateWheelNodes(ctx, Keyword.WHEELS, wheel.numRays, wheel);
    ctx.module.wheels.push(wheel);
};

export const parseWheels2: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(17)) { return; }

    const wheel: Wheel2 = {
        rimRadius: ctx.getArgFloat(0),
        tyreRadius: ctx.getArgFloat(1),
        width: ctx.getArgFloat(2),
        numRays: ctx.getArgInt(3),
        nodes: [ctx.getArgNodeRef(4), ctx.getArgNodeRef(5)],
        rigidityNode: ctx.getArgRigidityNode(6),
        braking: ctx.getArgBraking(7),
        propulsion: ctx.getArgPropulsion(8),
        referenceArmNode: ctx.getArgNodeRef(9),
        mass: ctx.getArgFloat(10),
        rimSpringiness: ctx.getArgFloat(11),
        rimDamping: ctx.getArgFloat(12),
        tyreSpringiness: ctx.getArgFloat(13),
        tyreDamping: ctx.getArgFloat(14),
        faceMaterialName: ctx.getArgStr(15),
        bandMaterialName: ctx.getArgStr(16),
        nodeDefaults: ctx.defaults.node,
        beamDefaults: ctx.defaults.beam,
    };
    generateWheelNodes(ctx, Keyword.WHEELS2, wheel.numRays, wheel);
    ctx.module.wheels2.push(wheel);
};

export const parseMeshWheels: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(16)) { return; }

    const keyword = ctx.currentBlock === Keyword.MESHWHEELS2 ? Keyword.MESHWHEELS2 : Keyword.MESHWHEELS;
    const wheel: MeshWheel = {
        isMeshwheel2: keyword === Keyword.MESHWHEELS2,
        tyreRadius: ctx.getArgFloat(0),
        rimRadius: ctx.getArgFloat(1),
        width: ctx.getArgFloat(2),
        numRays: ctx.getArgInt(3),
        nodes: [ctx.getArgNodeRef(4), ctx.getArgNodeRef(5)],
        rigidityNode: ctx.getArgRigidityNode(6),
        braking: ctx.getArgBraking(7),
        propulsion: ctx.getArgPropulsion(8),
        referenceArmNode: ctx.getArgNodeRef(9),
        mass: ctx.getArgFloat(10),
        spring: ctx.getArgFloat(11),
        damping: ctx.getArgFloat(12),
        side: ctx.getArgWheelSide(13),
        meshName: ctx.getArgStr(14),
        materialName: ctx.getArgStr(15),
        nodeDefaults: ctx.defaults.node,
        beamDefaults: ctx.defaults.beam,
    };
    generateWheelNodes(ctx, keyword, wheel.numRays, wheel);
    ctx.module.meshWheels.push(wheel);
};

export const parseFlexBodyWheels: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(16)) { return; }

    const wheel: FlexBodyWheel = {
        tyreRadius: ctx.getArgFloat(0),
        rimRadius: ctx.getArgFloat(1),
        width: ctx.getArgFloat(2),
        numRays: ctx.getArgInt(3),
        nodes: [ctx.getArgNodeRef(4), ctx.getArgNodeRef(5)],
        rigidityNode: ctx.getArgRigidityNode(6),
        braking: ctx.getArgBraking(7),
        propulsion: ctx.getArgPropulsion(8),
        referenceArmNode: ctx.getArgNodeRef(9),
        mass: ctx.getArgFloat(10),
        tyreSpringiness: ctx.getArgFloat(11),
        tyreDamping: ctx.getArgFloat(12),
        rimSpringiness: ctx.getArgFloat(13),
        rimDamping: ctx.getArgFloat(14),
        side: ctx.getArgWheelSide(15),
        rimMeshName: ctx.numArgs > 16 ? ctx.getArgStr(16) : '',
        tyreMeshName: ctx.numArgs > 17 ? ctx.getArgStr(17) : '',
        nodeDefaults: ctx.defaults.node,
        beamDefaults: ctx.defaults.beam,
    };
    generateWheelNodes(ctx, Keyword.FLEXBODYWHEELS, wheel.numRays, wheel);
    ctx.module.flexBodyWheels.push(wheel);
};

export const parseWheelDetachers: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(2)) { return; }

    ctx.module.wheelDetachers.push({
        wheelId: ctx.getArgInt(0),
        detacherGroup: ctx.getArgInt(1),
    });
};

//#endregion

//#region Axles

// `w1(a b)` wheel pair, or `d(ols)` differential types
const AXLE_PROPERTY = /^\s*(?:w(\d+)\(\s*([^\s()]+)\s+([^\s()]+)\s*\)|d\(\s*(\w*)\s*\))\s*$/;

function parseDifferentialTypes(ctx: ParserContext, text: string): DifferentialType[] {
    const types: DifferentialType[] = [];
    for (const c of text) {
        const type = Object.values(DifferentialType).find(t => t === c);
        if (type) {
            types.push(type);
        } else {
            ctx.warning(`ignoring invalid differential type '${c}'`, ErrorCodes.UNKNOWN_OPTION);
        }
    }
    return types;
}

export const parseAxles: LineHandler = (ctx) => {
    const axle: Axle = { wheels: [null, null], options: [] };

    for (const item of splitPayload(ctx.line, 0, ',')) {
        const m = AXLE_PROPERTY.exec(item);
        if (!m) {
            ctx.error('Invalid property, ignoring whole line...', ErrorCodes.STRUCTURAL);
            return;
        }
        if (m[1] !== undefined) {
            const wheelIndex = Number.parseInt(m[1], 10) - 1;
            if (wheelIndex !== 0 && wheelIndex !== 1) {
                ctx.error(`Invalid wheel index w${m[1]}, ignoring whole line...`, ErrorCodes.INVALID_VALUE);
                return;
            }
            const pair: [NodeRef, NodeRef] = [ctx.parseNodeRef(m[2]), ctx.parseNodeRef(m[3])];
            axle.wheels[wheelIndex] = pair;
        } else {
            axle.options.push(...parseDifferentialTypes(ctx, m[4] ?? ''));
        }
    }
    ctx.module.axles.push(axle);
};

export const parseInterAxles: LineHandler = (ctx) => {
    const items = splitPayload(ctx.line, 0, ',');
    ctx.numArgs = items.length;
    if (!ctx.checkNumArguments(3)) { return; }

    const m = AXLE_PROPERTY.exec(items[2]);
    if (!m) {
        ctx.error('Invalid property, ignoring whole line...', ErrorCodes.STRUCTURAL);
        return;
    }
    ctx.module.interAxles.push({
        a1: ctx.parseArgInt(items[0]) - 1,
        a2: ctx.parseArgInt(items[1]) - 1,
        options: m[4] !== undefined ? parseDifferentialTypes(ctx, m[4]) : [],
    });
};

export const parseTransferCase: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(2)) { return; }

    const tc: TransferCase = {
        a1: ctx.getArgInt(0) - 1,
        a2: ctx.getArgInt(1) - 1,
        has2wd: true,
        has2wdLo: false,
        gearRatios: [],
    };
    if (ctx.numArgs > 2) { tc.has2wd = ctx.getArgInt(2) !== 0; }
    if (ctx.numArgs > 3) { tc.has2wdLo = ctx.getArgInt(3) !== 0; }
    for (let i = 4; i < ctx.numArgs; ++i) {
        tc.gearRatios.push(ctx.getArgFloat(i));
    }
    ctx.module.transferCase.push(tc);
};

export const parseBrakes: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(1)) { return; }

    ctx.module.brakes.push({
        defaultBrakingForce: ctx.getArgFloat(0),
        parkingBrakeForce: ctx.numArgs > 1 ? ctx.getArgFloat(1) : -1,
    });
};

//#endregion

//#region Driving Aids

/**
 * Parse `mode:` tokens from `start` on. A token that is not a mode
 * declaration is an error and resets the switches.
 */
function parseControlModes(ctx: ParserContext, tokens: string[], start: number): ControlModeAttributes {
    const attrs: ControlModeAttributes = { ...DEFAULT_CONTROL_MODE };
    for (let i = start; i < tokens.length; ++i) {
        if (!applyControlModeToken(tokens[i], attrs)) {
            ctx.error('missing mode', ErrorCodes.UNKNOWN_ATTRIBUTE);
            Object.assign(attrs, DEFAULT_CONTROL_MODE);
        }
    }
    return attrs;
}

export const parseTractionControl: LineHandler = (ctx) => {
    const tokens = splitPayload(ctx.line, Keyword.TRACTION_CONTROL.length, ',');
    ctx.numArgs = tokens.length;
    if (!ctx.checkNumArguments(2)) { return; }

    const attrs = parseControlModes(ctx, tokens, 4);
    ctx.module.tractionControl.push({
        regulationForce: ctx.parseArgFloat(tokens[0]),
        wheelSlip: ctx.parseArgFloat(tokens[1]),
        fadeSpeed: tokens.length > 2 ? ctx.parseArgFloat(tokens[2]) : 0,
        pulsePerSec: tokens.length > 3 ? ctx.parseArgFloat(tokens[3]) : 0,
        attrIsOn: attrs.isOn,
        attrNoDashboard: attrs.noDashboard,
        attrNoToggle: attrs.noToggle,
    });
};

export const parseAntiLockBrakes: LineHandler = (ctx) => {
    const tokens = splitPayload(ctx.line, Keyword.ANTI_LOCK_BRAKES.length, ',');
    ctx.numArgs = tokens.length;
    if (!ctx.checkNumArguments(2)) { return; }

    const regulationForce = ctx.parseArgFloat(tokens[0]);
    const minSpeed = ctx.parseArgInt(tokens[1]);
    const pulsePerSec = tokens.length > 2 ? ctx.parseArgFloat(tokens[2]) : 0;
    const attrs = parseControlModes(ctx, tokens, 3);
    ctx.module.antiLockBrakes.push({
        regulationForce,
        minSpeed,
        pulsePerSec,
        attrIsOn: attrs.isOn,
        attrNoDashboard: attrs.noDashboard,
        attrNoToggle: attrs.noToggle,
    });
};

export const parseCruiseControl: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(3)) { return; }

    ctx.module.cruiseControl.push({
        minSpeed: ctx.getArgFloat(1),
        autobrake: ctx.getArgInt(2),
    });
};

export const parseSpeedLimiter: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(2)) { return; }

    ctx.module.speedLimiter.push({
        isEnabled: true,
        maxSpeed: ctx.getArgFloat(1),
    });
};

//#endregion
