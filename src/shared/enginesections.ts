/**
 * @file enginesections.ts
 * Extractors for the engine, its options, turbos and torque curve
 */

import { ErrorCodes } from './diagnostics';
import { splitPayload } from './lexer';
import { LineHandler } from './parsercontext';
import { Engine, EngineType, Engoption, Engturbo } from './rigdef';

const MAX_TURBOS = 4;

export const parseEngine: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(6)) { return; }

    const engine: Engine = {
        shiftDownRpm: ctx.getArgFloat(0),
        shiftUpRpm: ctx.getArgFloat(1),
        torque: ctx.getArgFloat(2),
        globalGearRatio: ctx.getArgFloat(3),
        reverseGearRatio: ctx.getArgFloat(4),
        neutralGearRatio: ctx.getArgFloat(5),
        gearRatios: [],
    };

    // Forward gears, optionally terminated by a negative value
    for (let i = 6; i < ctx.numArgs; ++i) {
        const ratio = ctx.getArgFloat(i);
        if (ratio < 0) {
            break;
        }
        engine.gearRatios.push(ratio);
    }

    if (engine.gearRatios.length === 0) {
        ctx.error('no forward gear', ErrorCodes.STRUCTURAL);
        return;
    }
    ctx.module.engines.push(engine);
};

export const parseEngoption: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(1)) { return; }

    const engoption: Engoption = {
        inertia: ctx.getArgFloat(0),
        type: EngineType.Truck,
        clutchForce: -1,
        shiftTime: -1,
        clutchTime: -1,
        postShiftTime: -1,
        stallRpm: -1,
        idleRpm: -1,
        maxIdleMixture: -1,
        minIdleMixture: -1,
        brakingTorque: -1,
    };

    if (ctx.numArgs > 1) {
        const c = ctx.getArgChar(1);
        const type = Object.values(EngineType).find(t => t === c);
        if (type) {
            engoption.type = type;
        } else {
            ctx.warning(`Invalid engine type '${c}', falling back to 't' (truck)`, ErrorCodes.INVALID_VALUE);
        }
    }
    if (ctx.numArgs > 2) { engoption.clutchForce = ctx.getArgFloat(2); }
    if (ctx.numArgs > 3) { engoption.shiftTime = ctx.getArgFloat(3); }
    if (ctx.numArgs > 4) { engoption.clutchTime = ctx.getArgFloat(4); }
    if (ctx.numArgs > 5) { engoption.postShiftTime = ctx.getArgFloat(5); }
    if (ctx.numArgs > 6) { engoption.stallRpm = ctx.getArgFloat(6); }
    if (ctx.numArgs > 7) { engoption.idleRpm = ctx.getArgFloat(7); }
    if (ctx.numArgs > 8) { engoption.maxIdleMixture = ctx.getArgFloat(8); }
    if (ctx.numArgs > 9) { engoption.minIdleMixture = ctx.getArgFloat(9); }
    if (ctx.numArgs > 10) { engoption.brakingTorque = ctx.getArgFloat(10); }

    ctx.module.engoptions.push(engoption);
};

export const parseEngturbo: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(4)) { return; }

    const engturbo: Engturbo = {
        version: ctx.getArgInt(0),
        tinertiaFactor: ctx.getArgFloat(1),
        nturbos: ctx.getArgInt(2),
        params: [],
    };
    for (let i = 3; i < Math.min(ctx.numArgs, 14); ++i) {
        engturbo.params.push(ctx.getArgFloat(i));
    }

    if (engturbo.nturbos > MAX_TURBOS) {
        ctx.warning(`You cannot have more than ${MAX_TURBOS} turbos. Fallback: using ${MAX_TURBOS} instead.`,
            ErrorCodes.INVALID_VALUE);
        engturbo.nturbos = MAX_TURBOS;
    }
    ctx.module.engturbos.push(engturbo);
};

/** One item names a predefined curve, two items are a (power, torque %) sample */
export const parseTorqueCurve: LineHandler = (ctx) => {
    const items = splitPayload(ctx.line, 0, ',');
    const curve = ctx.module.torqueCurve ?? { predefinedFuncName: '', samples: [] };
    ctx.module.torqueCurve = curve;

    if (items.length === 1) {
        curve.predefinedFuncName = items[0];
    } else if (items.length === 2) {
        curve.samples.push({
            power: ctx.parseArgFloat(items[0]),
            torquePercent: ctx.parseArgFloat(items[1]),
        });
    } else {
        ctx.error('too many arguments, skipping', ErrorCodes.ARGUMENT_COUNT);
    }
};
