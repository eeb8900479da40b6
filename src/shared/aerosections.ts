/**
 * @file aerosections.ts
 * Extractors for aerodynamic and propulsion elements
 */

import { Keyword } from './keywords';
import { NodeRef } from './noderef';
import { LineHandler } from './parsercontext';
import { Fusedrag, vec3, Wing } from './rigdef';

const DEFAULT_FUSEDRAG_AIRFOIL = 'NACA0009.afl';

export const parseWings: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(16)) { return; }

    const wing: Wing = {
        nodes: [
            ctx.getArgNodeRef(0), ctx.getArgNodeRef(1), ctx.getArgNodeRef(2), ctx.getArgNodeRef(3),
            ctx.getArgNodeRef(4), ctx.getArgNodeRef(5), ctx.getArgNodeRef(6), ctx.getArgNodeRef(7),
        ],
        texCoords: [],
        controlSurface: 'n',
        chordPoint: -1,
        minDeflection: -1,
        maxDeflection: -1,
        airfoil: '',
        efficacyCoef: 1,
    };
    for (let i = 8; i < 16; ++i) {
        wing.texCoords.push(ctx.getArgFloat(i));
    }

    if (ctx.numArgs > 16) { wing.controlSurface = ctx.getArgWingSurface(16); }
    if (ctx.numArgs > 17) { wing.chordPoint = ctx.getArgFloat(17); }
    if (ctx.numArgs > 18) { wing.minDeflection = ctx.getArgFloat(18); }
    if (ctx.numArgs > 19) { wing.maxDeflection = ctx.getArgFloat(19); }
    if (ctx.numArgs > 20) { wing.airfoil = ctx.getArgStr(20); }
    if (ctx.numArgs > 21) { wing.efficacyCoef = ctx.getArgFloat(21); }

    ctx.module.wings.push(wing);
};

export const parseAirbrakes: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(14)) { return; }

    ctx.module.airbrakes.push({
        referenceNode: ctx.getArgNodeRef(0),
        xAxisNode: ctx.getArgNodeRef(1),
        yAxisNode: ctx.getArgNodeRef(2),
        additionalNode: ctx.getArgNodeRef(3),
        offset: vec3(ctx.getArgFloat(4), ctx.getArgFloat(5), ctx.getArgFloat(6)),
        width: ctx.getArgFloat(7),
        height: ctx.getArgFloat(8),
        maxInclinationAngle: ctx.getArgFloat(9),
        texcoordX1: ctx.getArgFloat(10),
        texcoordY1: ctx.getArgFloat(11),
        texcoordX2: ctx.getArgFloat(12),
        texcoordY2: ctx.getArgFloat(13),
    });
};

/**
 * `autocalc` in the third column derives the drag area from the vehicle size;
 * otherwise that column is the approximate width.
 */
export const parseFusedrag: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(3)) { return; }

    const fusedrag: Fusedrag = {
        frontNode: ctx.getArgNodeRef(0),
        rearNode: ctx.getArgNodeRef(1),
        autocalc: false,
        approximateWidth: 0,
        areaCoefficient: 1,
        airfoilName: DEFAULT_FUSEDRAG_AIRFOIL,
    };

    if (ctx.getArgStr(2) === 'autocalc') {
        fusedrag.autocalc = true;
        if (ctx.numArgs > 3) { fusedrag.areaCoefficient = ctx.getArgFloat(3); }
        if (ctx.numArgs > 4) { fusedrag.airfoilName = ctx.getArgStr(4); }
    } else {
        fusedrag.approximateWidth = ctx.getArgFloat(2);
        if (ctx.numArgs > 3) { fusedrag.airfoilName = ctx.getArgStr(3); }
    }
    ctx.module.fusedrag.push(fusedrag);
};

export const parseTurboprops: LineHandler = (ctx) => {
    const isTurboprops2 = ctx.currentBlock === Keyword.TURBOPROPS2;
    if (!ctx.checkNumArguments(isTurboprops2 ? 9 : 8)) { return; }

    const offset = isTurboprops2 ? 1 : 0;
    ctx.module.turboprops.push({
        formatVersion: isTurboprops2 ? 2 : 1,
        referenceNode: ctx.getArgNodeRef(0),
        axisNode: ctx.getArgNodeRef(1),
        bladeTipNodes: [
            ctx.getArgNodeRef(2),
            ctx.getArgNodeRef(3),
            ctx.getArgNullableNode(4),
            ctx.getArgNullableNode(5),
        ],
        coupleNode: isTurboprops2 ? ctx.getArgNullableNode(6) : NodeRef.invalid(),
        turbinePowerKw: ctx.getArgFloat(6 + offset),
        airfoil: ctx.getArgStr(7 + offset),
    });
};

export const parsePistonprops: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(10)) { return; }

    ctx.module.pistonprops.push({
        referenceNode: ctx.getArgNodeRef(0),
        axisNode: ctx.getArgNodeRef(1),
        bladeTipNodes: [
            ctx.getArgNodeRef(2),
            ctx.getArgNodeRef(3),
            ctx.getArgNullableNode(4),
            ctx.getArgNullableNode(5),
        ],
        coupleNode: ctx.getArgNullableNode(6),
        turbinePowerKw: ctx.getArgFloat(7),
        pitch: ctx.getArgFloat(8),
        airfoil: ctx.getArgStr(9),
    });
};

export const parseTurbojets: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(9)) { return; }

    ctx.module.turbojets.push({
        frontNode: ctx.getArgNodeRef(0),
        backNode: ctx.getArgNodeRef(1),
        sideNode: ctx.getArgNodeRef(2),
        isReversable: ctx.getArgInt(3) !== 0,
        dryThrust: ctx.getArgFloat(4),
        wetThrust: ctx.getArgFloat(5),
        frontDiameter: ctx.getArgFloat(6),
        backDiameter: ctx.getArgFloat(7),
        nozzleLength: ctx.getArgFloat(8),
    });
};

export const parseScrewprops: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(4)) { return; }

    ctx.module.screwprops.push({
        propNode: ctx.getArgNodeRef(0),
        backNode: ctx.getArgNodeRef(1),
        topNode: ctx.getArgNodeRef(2),
        power: ctx.getArgFloat(3),
    });
};
