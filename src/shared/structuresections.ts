/**
 * @file structuresections.ts
 * Extractors for the soft-body structure: nodes, beams, shocks, hydraulics,
 * commands, ties, triggers, hooks and related sections
 */

import { ErrorCodes } from './diagnostics';
import { Keyword } from './keywords';
import { NodeId, NodeRef } from './noderef';
import { hasBit, OptionTable } from './optionparsing';
import { LineHandler, ParserContext } from './parsercontext';
import { splitPayload } from './lexer';
import {
    AeroAnimatorOption,
    Animator,
    AnimatorOption,
    Beam,
    BeamOption,
    Cinecam,
    Command,
    emptyInertia,
    Hook,
    Hydro,
    Lockgroup,
    MinimassOption,
    Node,
    NodeOption,
    Rotator,
    Shock2Option,
    Shock3Option,
    ShockOption,
    SlideNode,
    SlideNodeConstraint,
    Tie,
    TriggerAction,
    TriggerOption,
    vec3,
} from './rigdef';

//#region Option Tables

export const NODE_OPTIONS: OptionTable = {
    l: NodeOption.LoadWeight,
    n: [NodeOption.MouseGrab, NodeOption.NoMouseGrab],
    m: [NodeOption.NoMouseGrab, NodeOption.MouseGrab],
    f: NodeOption.NoSparks,
    x: NodeOption.ExhaustPoint,
    y: NodeOption.ExhaustDirection,
    c: NodeOption.NoGroundContact,
    h: NodeOption.HookPoint,
    e: NodeOption.TerrainEditPoint,
    b: NodeOption.ExtraBuoyancy,
    p: NodeOption.NoParticles,
    L: NodeOption.Log,
};

const BEAM_OPTIONS: OptionTable = {
    v: 0,
    i: BeamOption.Invisible,
    r: BeamOption.Rope,
    s: BeamOption.Support,
};

const SHOCK_OPTIONS: OptionTable = {
    n: 0,
    v: 0,
    i: ShockOption.Invisible,
    m: ShockOption.Metric,
    r: ShockOption.ActiveRight,
    R: ShockOption.ActiveRight,
    l: ShockOption.ActiveLeft,
    L: ShockOption.ActiveLeft,
};

const SHOCK2_OPTIONS: OptionTable = {
    n: 0,
    v: 0,
    i: Shock2Option.Invisible,
    m: Shock2Option.Metric,
    M: Shock2Option.AbsoluteMetric,
    s: Shock2Option.SoftBumpBounds,
};

const SHOCK3_OPTIONS: OptionTable = {
    n: 0,
    v: 0,
    i: Shock3Option.Invisible,
    m: Shock3Option.Metric,
    M: Shock3Option.AbsoluteMetric,
};

const TRIGGER_OPTIONS: OptionTable = {
    i: TriggerOption.Invisible,
    c: TriggerOption.CommandStyle,
    x: TriggerOption.StartOff,
    b: TriggerOption.BlockKeys,
    B: TriggerOption.BlockTriggers,
    A: TriggerOption.InvBlockTriggers,
    s: TriggerOption.SwitchCmdNum,
    h: TriggerOption.UnlockHookgroupsKey,
    H: TriggerOption.LockHookgroupsKey,
    t: TriggerOption.Continuous,
    E: TriggerOption.EngineTrigger,
};

const invalidOption = (c: string): string => `ignoring invalid option '${c}'`;

//#endregion

//#region Nodes and Beams

export const parseNodes: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(4)) { return; }

    let id: NodeId;
    if (ctx.currentBlock === Keyword.NODES2) {
        const name = ctx.getArgStr(0);
        id = NodeId.named(name);
        if (ctx.importer.isEnabled) {
            ctx.importer.addNamedNode(name);
        }
    } else {
        const num = ctx.getArgUint(0);
        id = NodeId.numbered(num);
        if (ctx.importer.isEnabled) {
            const expected = ctx.importer.addNumberedNode(num);
            if (expected !== null) {
                ctx.warning(`Node ${num} is out of sequence, expected ${expected}`, ErrorCodes.INVALID_VALUE);
            }
        }
    }

    const node: Node = {
        id,
        position: vec3(ctx.getArgFloat(1), ctx.getArgFloat(2), ctx.getArgFloat(3)),
        options: 0,
        nodeDefaults: ctx.defaults.node,
        beamDefaults: ctx.defaults.beam,
        defaultMinimass: ctx.defaults.minimass,
        detacherGroup: ctx.defaults.currentDetacherGroup,
    };
    if (ctx.numArgs > 4) {
        node.options = ctx.foldOptions(ctx.getArgStr(4), NODE_OPTIONS, c => `invalid option '${c}'`);
    }
    if (ctx.numArgs > 5) {
        if (hasBit(node.options, NodeOption.LoadWeight)) {
            node.loadWeightOverride = ctx.getArgFloat(5);
        } else {
            ctx.warning("Node has load-weight-override value specified, but option 'l' is not present. Ignoring value...",
                ErrorCodes.INVALID_VALUE);
        }
    }
    ctx.module.nodes.push(node);
};

export const parseBeams: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(2)) { return; }

    const options = ctx.numArgs > 2 ? ctx.foldOptions(ctx.getArgStr(2), BEAM_OPTIONS, invalidOption) : 0;
    const beam: Beam = {
        nodes: [ctx.getArgNodeRef(0), ctx.getArgNodeRef(1)],
        options,
        defaults: ctx.defaults.beam,
        detacherGroup: ctx.defaults.currentDetacherGroup,
    };
    if (ctx.numArgs > 3 && hasBit(options, BeamOption.Support)) {
        beam.extensionBreakLimit = Math.max(0, ctx.getArgInt(3));
    }
    ctx.module.beams.push(beam);
};

//#endregion

//#region Shocks and Hydros

export const parseShocks: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(7)) { return; }

    ctx.module.shocks.push({
        nodes: [ctx.getArgNodeRef(0), ctx.getArgNodeRef(1)],
        springRate: ctx.getArgFloat(2),
        damping: ctx.getArgFloat(3),
        shortBound: ctx.getArgFloat(4),
        longBound: ctx.getArgFloat(5),
        precompression: ctx.getArgFloat(6),
        options: ctx.numArgs > 7 ? ctx.foldOptions(ctx.getArgStr(7), SHOCK_OPTIONS, invalidOption) : 0,
        beamDefaults: ctx.defaults.beam,
        detacherGroup: ctx.defaults.currentDetacherGroup,
    });
};

export const parseShocks2: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(13)) { return; }

    ctx.module.shocks2.push({
        nodes: [ctx.getArgNodeRef(0), ctx.getArgNodeRef(1)],
        springIn: ctx.getArgFloat(2),
        dampIn: ctx.getArgFloat(3),
        progressFactorSpringIn: ctx.getArgFloat(4),
        progressFactorDampIn: ctx.getArgFloat(5),
        springOut: ctx.getArgFloat(6),
        dampOut: ctx.getArgFloat(7),
        progressFactorSpringOut: ctx.getArgFloat(8),
        progressFactorDampOut: ctx.getArgFloat(9),
        shortBound: ctx.getArgFloat(10),
        longBound: ctx.getArgFloat(11),
        precompression: ctx.getArgFloat(12),
        options: ctx.numArgs > 13 ? ctx.foldOptions(ctx.getArgStr(13), SHOCK2_OPTIONS, invalidOption) : 0,
        beamDefaults: ctx.defaults.beam,
        detacherGroup: ctx.defaults.currentDetacherGroup,
    });
};

export const parseShocks3: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(15)) { return; }

    ctx.module.shocks3.push({
        nodes: [ctx.getArgNodeRef(0), ctx.getArgNodeRef(1)],
        springIn: ctx.getArgFloat(2),
        dampIn: ctx.getArgFloat(3),
        dampInSlow: ctx.getArgFloat(4),
        splitVelIn: ctx.getArgFloat(5),
        dampInFast: ctx.getArgFloat(6),
        springOut: ctx.getArgFloat(7),
        dampOut: ctx.getArgFloat(8),
        dampOutSlow: ctx.getArgFloat(9),
        splitVelOut: ctx.getArgFloat(10),
        dampOutFast: ctx.getArgFloat(11),
        shortBound: ctx.getArgFloat(12),
        longBound: ctx.getArgFloat(13),
        precompression: ctx.getArgFloat(14),
        options: ctx.numArgs > 15 ? ctx.foldOptions(ctx.getArgStr(15), SHOCK3_OPTIONS, invalidOption) : 0,
        beamDefaults: ctx.defaults.beam,
        detacherGroup: ctx.defaults.currentDetacherGroup,
    });
};

export const parseHydros: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(3)) { return; }

    const inertia = emptyInertia();
    const hydro: Hydro = {
        nodes: [ctx.getArgNodeRef(0), ctx.getArgNodeRef(1)],
        lengtheningFactor: ctx.getArgFloat(2),
        options: ctx.numArgs > 3 ? ctx.getArgStr(3) : '',
        inertia,
        inertiaDefaults: ctx.defaults.inertia,
        beamDefaults: ctx.defaults.beam,
        detacherGroup: ctx.defaults.currentDetacherGroup,
    };
    ctx.parseOptionalInertia(inertia, 4);
    ctx.module.hydros.push(hydro);
};

//#endregion

//#region Commands

/**
 * One-press ('o', 'p') and auto-center ('c') are mutually exclusive; the
 * first of them in the option string wins.
 */
function resolveCommandConflicts(ctx: ParserContext, command: Command, winner: string): void {
    if (winner === '') {
        return;
    }
    if (command.optionAutoCenter && winner !== 'c') {
        ctx.warning("Command cannot be one-pressed and self centering at the same time, ignoring flag 'c'",
            ErrorCodes.UNKNOWN_OPTION);
        command.optionAutoCenter = false;
    }
    let ignored = '';
    if (command.optionOnePressCenter && winner !== 'o') {
        command.optionOnePressCenter = false;
        ignored = 'o';
    } else if (command.optionOnePress && winner !== 'p') {
        command.optionOnePress = false;
        ignored = 'p';
    }
    if (ignored === '') {
        return;
    }
    if (winner === 'c') {
        ctx.warning(`Command cannot be one-pressed and self centering at the same time, ignoring flag '${ignored}'`,
            ErrorCodes.UNKNOWN_OPTION);
    } else {
        ctx.warning(`Command already has a one-pressed c.mode, ignoring flag '${ignored}'`, ErrorCodes.UNKNOWN_OPTION);
    }
}

export const parseCommands: LineHandler = (ctx) => {
    const isCommands2 = ctx.currentBlock === Keyword.COMMANDS2;
    const minArgs = isCommands2 ? 8 : 7;
    if (!ctx.checkNumArguments(minArgs)) { return; }

    let pos = 0;
    const nodes: [NodeRef, NodeRef] = [ctx.getArgNodeRef(pos++), ctx.getArgNodeRef(pos++)];
    const shortenRate = ctx.getArgFloat(pos++);
    const lengthenRate = isCommands2 ? ctx.getArgFloat(pos++) : shortenRate;

    const command: Command = {
        formatVersion: isCommands2 ? 2 : 1,
        nodes,
        shortenRate,
        lengthenRate,
        maxContraction: ctx.getArgFloat(pos++),
        maxExtension: ctx.getArgFloat(pos++),
        contractKey: ctx.getArgInt(pos++),
        extendKey: ctx.getArgInt(pos++),
        description: '',
        optionInvisible: false,
        optionRope: false,
        optionNotFaster: false,
        optionAutoCenter: false,
        optionOnePress: false,
        optionOnePressCenter: false,
        inertia: emptyInertia(),
        affectEngine: 1,
        needsEngine: true,
        playsSound: true,
        inertiaDefaults: ctx.defaults.inertia,
        beamDefaults: ctx.defaults.beam,
        detacherGroup: ctx.defaults.currentDetacherGroup,
    };

    if (ctx.numArgs <= minArgs) {
        ctx.module.commands.push(command);
        return;
    }

    let winner = '';
    for (const c of ctx.getArgStr(pos++)) {
        if (winner === '' && (c === 'o' || c === 'p' || c === 'c')) {
            winner = c;
        }
        switch (c) {
            case 'n': break;
            case 'i': command.optionInvisible = true; break;
            case 'r': command.optionRope = true; break;
            case 'f': command.optionNotFaster = true; break;
            case 'c': command.optionAutoCenter = true; break;
            case 'p': command.optionOnePress = true; break;
            case 'o': command.optionOnePressCenter = true; break;
            default:
                ctx.warning(`ignoring unknown flag '${c}'`, ErrorCodes.UNKNOWN_OPTION);
        }
    }
    resolveCommandConflicts(ctx, command, winner);

    if (ctx.numArgs > pos) { command.description = ctx.getArgStr(pos++); }
    if (ctx.numArgs > pos) { ctx.parseOptionalInertia(command.inertia, pos); pos += 4; }
    if (ctx.numArgs > pos) { command.affectEngine = ctx.getArgFloat(pos++); }
    if (ctx.numArgs > pos) { command.needsEngine = ctx.getArgBool(pos++); }
    if (ctx.numArgs > pos) { command.playsSound = ctx.getArgBool(pos++); }

    ctx.module.commands.push(command);
};

//#endregion

//#region Ropes, Ties, Triggers, Hooks

export const parseRopes: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(2)) { return; }

    ctx.module.ropes.push({
        rootNode: ctx.getArgNodeRef(0),
        endNode: ctx.getArgNodeRef(1),
        invisible: ctx.numArgs > 2 && ctx.getArgChar(2) === 'i',
        beamDefaults: ctx.defaults.beam,
        detacherGroup: ctx.defaults.currentDetacherGroup,
    });
};

export const parseRopables: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(1)) { return; }

    ctx.module.ropables.push({
        node: ctx.getArgNodeRef(0),
        group: ctx.numArgs > 1 ? ctx.getArgInt(1) : -1,
        hasMultilock: ctx.numArgs > 2 && ctx.getArgInt(2) === 1,
    });
};

export const parseTies: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(5)) { return; }

    const tie: Tie = {
        rootNode: ctx.getArgNodeRef(0),
        maxReachLength: ctx.getArgFloat(1),
        autoShortenRate: ctx.getArgFloat(2),
        minLength: ctx.getArgFloat(3),
        maxLength: ctx.getArgFloat(4),
        isInvisible: false,
        disableSelfLock: false,
        maxStress: 100000,
        group: -1,
        beamDefaults: ctx.defaults.beam,
        detacherGroup: ctx.defaults.currentDetacherGroup,
    };
    if (ctx.numArgs > 5) {
        for (const c of ctx.getArgStr(5)) {
            switch (c) {
                case 'n':
                case 'v':
                    break;
                case 'i': tie.isInvisible = true; break;
                case 's': tie.disableSelfLock = true; break;
                default:
                    ctx.warning(invalidOption(c), ErrorCodes.UNKNOWN_OPTION);
            }
        }
    }
    if (ctx.numArgs > 6) { tie.maxStress = ctx.getArgFloat(6); }
    if (ctx.numArgs > 7) { tie.group = ctx.getArgInt(7); }
    ctx.module.ties.push(tie);
};

export const parseTriggers: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(6)) { return; }

    const nodes: [NodeRef, NodeRef] = [ctx.getArgNodeRef(0), ctx.getArgNodeRef(1)];
    const contractionTriggerLimit = ctx.getArgFloat(2);
    const expansionTriggerLimit = ctx.getArgFloat(3);
    const shortAction = ctx.getArgInt(4);
    const longAction = ctx.getArgInt(5);
    const options = ctx.numArgs > 6 ? ctx.foldOptions(ctx.getArgStr(6), TRIGGER_OPTIONS, invalidOption) : 0;

    let boundaryTimer = 1;
    if (ctx.numArgs > 7) {
        const value = ctx.getArgFloat(7);
        if (value > 0) {
            boundaryTimer = value;
        }
    }

    let action: TriggerAction;
    if (hasBit(options, TriggerOption.UnlockHookgroupsKey) || hasBit(options, TriggerOption.LockHookgroupsKey)) {
        action = { kind: 'hookToggle', contractionHookgroupId: shortAction, extensionHookgroupId: longAction };
    } else if (hasBit(options, TriggerOption.EngineTrigger)) {
        action = { kind: 'engine', functionId: shortAction, motorIndex: longAction };
    } else {
        action = { kind: 'commandKeys', contractionKey: shortAction, extensionKey: longAction };
    }

    ctx.module.triggers.push({
        nodes,
        contractionTriggerLimit,
        expansionTriggerLimit,
        options,
        boundaryTimer,
        action,
        beamDefaults: ctx.defaults.beam,
        detacherGroup: ctx.defaults.currentDetacherGroup,
    });
};

const HOOK_FLAGS: Readonly<Record<string, 'selfLock' | 'autoLock' | 'noDisable' | 'noRope' | 'visible'>> = {
    'selflock': 'selfLock', 'self-lock': 'selfLock', 'self_lock': 'selfLock',
    'autolock': 'autoLock', 'auto-lock': 'autoLock', 'auto_lock': 'autoLock',
    'nodisable': 'noDisable', 'no-disable': 'noDisable', 'no_disable': 'noDisable',
    'norope': 'noRope', 'no-rope': 'noRope', 'no_rope': 'noRope',
    'visible': 'visible', 'vis': 'visible',
};

export const parseHooks: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(1)) { return; }

    const hook: Hook = {
        node: ctx.getArgNodeRef(0),
        hookRange: 0.4,
        speedCoef: 1,
        maxForce: 10000000,
        hookGroup: -1,
        lockGroup: -1,
        timer: 5,
        minRangeMeters: 0,
        selfLock: false,
        autoLock: false,
        noDisable: false,
        noRope: false,
        visible: false,
    };

    for (let i = 1; i < ctx.numArgs; ++i) {
        const attr = ctx.getArgStr(i).trim();
        const hasValue = i < ctx.numArgs - 1;

        if (hasValue && attr === 'hookrange') {
            hook.hookRange = ctx.getArgFloat(++i);
        } else if (hasValue && attr === 'speedcoef') {
            hook.speedCoef = ctx.getArgFloat(++i);
        } else if (hasValue && attr === 'maxforce') {
            hook.maxForce = ctx.getArgFloat(++i);
        } else if (hasValue && attr === 'timer') {
            hook.timer = ctx.getArgFloat(++i);
        } else if (hasValue && (attr === 'hookgroup' || attr === 'hgroup')) {
            hook.hookGroup = ctx.getArgInt(++i);
        } else if (hasValue && (attr === 'lockgroup' || attr === 'lgroup')) {
            hook.lockGroup = ctx.getArgInt(++i);
        } else if (hasValue && (attr === 'shortlimit' || attr === 'short_limit')) {
            hook.minRangeMeters = ctx.getArgFloat(++i);
        } else if (Object.prototype.hasOwnProperty.call(HOOK_FLAGS, attr)) {
            hook[HOOK_FLAGS[attr]] = true;
        } else {
            ctx.warning(`ignoring invalid option '${attr}'`, ErrorCodes.UNKNOWN_ATTRIBUTE);
        }
    }
    ctx.module.hooks.push(hook);
};

//#endregion

//#region Node Lists

export const parseFixes: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(1)) { return; }
    ctx.module.fixes.push(ctx.getArgNodeRef(0));
};

export const parseContacters: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(1)) { return; }
    ctx.module.contacters.push(ctx.getArgNodeRef(0));
};

export const parseLockgroups: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(2)) { return; }

    const lockgroup: Lockgroup = { number: ctx.getArgInt(0), nodes: [] };
    for (let i = 1; i < ctx.numArgs; ++i) {
        lockgroup.nodes.push(ctx.getArgNodeRef(i));
    }
    ctx.module.lockgroups.push(lockgroup);
};

export const parseRailGroups: LineHandler = (ctx) => {
    const items = splitPayload(ctx.line, 0, ',');
    ctx.numArgs = items.length;
    if (!ctx.checkNumArguments(3)) { return; }

    ctx.module.railGroups.push({
        id: ctx.parseArgInt(items[0]),
        nodes: items.slice(1).map(item => ctx.parseNodeRef(item.trim())),
    });
};

export const parseCollisionBoxes: LineHandler = (ctx) => {
    const items = splitPayload(ctx.line, 0, ',');
    ctx.module.collisionBoxes.push({
        nodes: items.map(item => ctx.parseNodeRef(item.trim())),
    });
};

const SLIDENODE_CONSTRAINTS: Readonly<Record<string, SlideNodeConstraint>> = {
    a: SlideNodeConstraint.AttachAll,
    f: SlideNodeConstraint.AttachForeign,
    s: SlideNodeConstraint.AttachSelf,
    n: SlideNodeConstraint.AttachNone,
};

export const parseSlideNodes: LineHandler = (ctx) => {
    const items = splitPayload(ctx.line, 0, ', ');
    ctx.numArgs = items.length;
    if (!ctx.checkNumArguments(2)) { return; }

    const slideNode: SlideNode = {
        slideNode: ctx.parseNodeRef(items[0]),
        railNodes: [],
        constraintFlags: 0,
    };

    let inRailNodeList = true;
    for (const item of items.slice(1)) {
        const rest = item.substring(1);
        switch (item.charAt(0).toUpperCase()) {
            case 'S':
                slideNode.springRate = ctx.parseArgFloat(rest);
                inRailNodeList = false;
                break;
            case 'B':
                slideNode.breakForce = ctx.parseArgFloat(rest);
                inRailNodeList = false;
                break;
            case 'T':
                slideNode.tolerance = ctx.parseArgFloat(rest);
                inRailNodeList = false;
                break;
            case 'R':
                slideNode.attachmentRate = ctx.parseArgFloat(rest);
                inRailNodeList = false;
                break;
            case 'G':
                slideNode.railgroupId = ctx.parseArgFloat(rest);
                inRailNodeList = false;
                break;
            case 'D':
                slideNode.maxAttachDistance = ctx.parseArgFloat(rest);
                inRailNodeList = false;
                break;
            case 'C': {
                const c = item.charAt(1);
                const flag = Object.prototype.hasOwnProperty.call(SLIDENODE_CONSTRAINTS, c) ? SLIDENODE_CONSTRAINTS[c] : undefined;
                if (flag === undefined) {
                    ctx.warning(`Ignoring invalid option '${c}'`, ErrorCodes.UNKNOWN_OPTION);
                } else {
                    slideNode.constraintFlags |= flag;
                }
                inRailNodeList = false;
                break;
            }
            default:
                if (inRailNodeList) {
                    slideNode.railNodes.push(ctx.parseNodeRef(item));
                }
        }
    }
    ctx.module.slideNodes.push(slideNode);
};

//#endregion

//#region Animators and Rotators

const AERO_ANIMATOR_TOKEN = /^(throttle|rpm|aerotorq|aeropit|aerostatus)(\d+)$/;

function isStandaloneAnimatorOption(token: string): AnimatorOption | undefined {
    if (token === AnimatorOption.ShortLimit || token === AnimatorOption.LongLimit) {
        return undefined;
    }
    return Object.values(AnimatorOption).find(o => o === token);
}

function isAeroAnimatorOption(token: string): AeroAnimatorOption | undefined {
    return Object.values(AeroAnimatorOption).find(o => o === token);
}

export const parseAnimators: LineHandler = (ctx) => {
    const items = splitPayload(ctx.line, 0, ',');
    ctx.numArgs = items.length;
    if (!ctx.checkNumArguments(4)) { return; }

    const animator: Animator = {
        nodes: [ctx.parseNodeRef(items[0].trim()), ctx.parseNodeRef(items[1].trim())],
        lengtheningFactor: ctx.parseArgFloat(items[2]),
        flags: new Set<AnimatorOption>(),
        shortLimit: 0,
        longLimit: 0,
        aeroAnimator: { flags: new Set<AeroAnimatorOption>(), engineIndex: 0 },
        inertiaDefaults: ctx.defaults.inertia,
        beamDefaults: ctx.defaults.beam,
        detacherGroup: ctx.defaults.currentDetacherGroup,
    };

    for (const raw of items[3].split('|')) {
        const token = raw.trim();
        const aero = AERO_ANIMATOR_TOKEN.exec(token);
        if (aero) {
            const option = isAeroAnimatorOption(aero[1]);
            if (option) {
                animator.aeroAnimator.flags.add(option);
            }
            animator.aeroAnimator.engineIndex = ctx.parseArgUint(aero[2]) - 1;
            continue;
        }

        const isShortLimit = token.startsWith('shortlimit');
        if (isShortLimit || token.startsWith('longlimit')) {
            const fields = token.split(':');
            if (fields.length > 1) {
                const value = ctx.parseArgFloat(fields[1]);
                if (isShortLimit) {
                    animator.shortLimit = value;
                    animator.flags.add(AnimatorOption.ShortLimit);
                } else {
                    animator.longLimit = value;
                    animator.flags.add(AnimatorOption.LongLimit);
                }
            }
            continue;
        }

        const standalone = isStandaloneAnimatorOption(token);
        if (standalone) {
            animator.flags.add(standalone);
        } else if (token.length > 0) {
            ctx.warning(`ignoring invalid option '${token}'`, ErrorCodes.UNKNOWN_ATTRIBUTE);
        }
    }
    ctx.module.animators.push(animator);
};

export const parseRotators: LineHandler = (ctx) => {
    const isRotators2 = ctx.currentBlock === Keyword.ROTATORS2;
    if (!ctx.checkNumArguments(isRotators2 ? 16 : 13)) { return; }

    const rotator: Rotator = {
        axisNodes: [ctx.getArgNodeRef(0), ctx.getArgNodeRef(1)],
        basePlateNodes: [ctx.getArgNodeRef(2), ctx.getArgNodeRef(3), ctx.getArgNodeRef(4), ctx.getArgNodeRef(5)],
        rotatingPlateNodes: [ctx.getArgNodeRef(6), ctx.getArgNodeRef(7), ctx.getArgNodeRef(8), ctx.getArgNodeRef(9)],
        rate: ctx.getArgFloat(10),
        spinLeftKey: ctx.getArgInt(11),
        spinRightKey: ctx.getArgInt(12),
        inertia: emptyInertia(),
        engineCoupling: 1,
        needsEngine: false,
        inertiaDefaults: ctx.defaults.inertia,
    };

    let offset = 0;
    if (isRotators2) {
        rotator.rotatingForce = ctx.getArgFloat(13);
        rotator.tolerance = ctx.getArgFloat(14);
        rotator.description = ctx.getArgStr(15);
        offset = 3;
    }

    ctx.parseOptionalInertia(rotator.inertia, 13 + offset);
    if (ctx.numArgs > 17 + offset) { rotator.engineCoupling = ctx.getArgFloat(17 + offset); }
    if (ctx.numArgs > 18 + offset) { rotator.needsEngine = ctx.getArgBool(18 + offset); }

    if (isRotators2) {
        ctx.module.rotators2.push(rotator);
    } else {
        ctx.module.rotators.push(rotator);
    }
};

//#endregion

//#region Minimass and Cinecam

export const parseMinimass: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(1)) { return; }

    ctx.module.minimass.push({
        globalMinMassKg: ctx.getArgFloat(0),
        option: ctx.numArgs > 1 ? ctx.getArgMinimassOption(1) : MinimassOption.Dummy,
    });
    ctx.currentBlock = null;
};

export const parseCinecam: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(11)) { return; }

    const cinecam: Cinecam = {
        position: vec3(ctx.getArgFloat(0), ctx.getArgFloat(1), ctx.getArgFloat(2)),
        nodes: [
            ctx.getArgNodeRef(3), ctx.getArgNodeRef(4), ctx.getArgNodeRef(5), ctx.getArgNodeRef(6),
            ctx.getArgNodeRef(7), ctx.getArgNodeRef(8), ctx.getArgNodeRef(9), ctx.getArgNodeRef(10),
        ],
        spring: 8000,
        damping: 800,
        nodeMass: 20,
        nodeDefaults: ctx.defaults.node,
        beamDefaults: ctx.defaults.beam,
    };
    if (ctx.numArgs > 11) { cinecam.spring = ctx.getArgFloat(11); }
    if (ctx.numArgs > 12) { cinecam.damping = ctx.getArgFloat(12); }
    if (ctx.numArgs > 13) {
        const mass = ctx.getArgFloat(13);
        if (mass > 0) {
            cinecam.nodeMass = mass;
        }
    }
    if (ctx.importer.isEnabled) {
        ctx.importer.addGeneratedNodes(1, cinecam);
    }
    ctx.module.cinecams.push(cinecam);
};

//#endregion
