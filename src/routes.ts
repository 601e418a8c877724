import type { FastifyReply, FastifyRequest } from 'fastify';
import {
    AvoidTimeSchema,
    AvoidTimeParamsSchema,
    SettingsPatchSchema
} from './schemas';
import { generate } from './domain/slotGenerator';
import { serializeSlot } from './domain/format';
import { InvalidConfigurationError } from './domain/errors';
import { formatHour24, parseTime } from './domain/timeOfDay';
import { FIELD_LABELS, applyPatch, parseForm } from './form';

import store from './store/db';

/**
 * Get the current editor settings
 *
 * @returns Settings form with text fields, avoided days and avoided time list
 */
export const getSettings = async () => store.getSettings();

/**
 * Update editor settings
 *
 * Only the fields present in the body change. Text fields are stored as entered and
 * validated when slots are generated.
 *
 * @param request - Fastify request with a partial settings form as body
 * @param reply - Fastify reply object
 * @returns Updated settings form
 *
 * @throws {400} Invalid input (unknown field, wrong type, unknown day name)
 */
export const updateSettings = async (request: FastifyRequest, reply: FastifyReply) => {
    const body = SettingsPatchSchema.safeParse(request.body ?? {});
    if (!body.success) {
        return reply.status(400).send({ error: 'invalid_input', detail: body.error.format() });
    }
    return store.updateSettings(body.data);
}

/**
 * Restore the default settings
 *
 * @returns 204 No Content
 */
export const resetSettings = async (_request: FastifyRequest, reply: FastifyReply) => {
    store.reset();
    return reply.status(204).send();
}

/**
 * Add a range to the avoided time list
 *
 * Times are normalized to zero-padded HH:MM before being stored.
 *
 * @param request - Fastify request with body:
 *   - day: Short day name (Mon ... Sun)
 *   - start: Range start (HH:mm)
 *   - end: Range end (HH:mm)
 * @param reply - Fastify reply object
 * @returns 201 with the updated settings form
 *
 * @throws {400} Invalid input, time not in HH:MM format, or start not before end
 */
export const addAvoidTime = async (request: FastifyRequest, reply: FastifyReply) => {
    const body = AvoidTimeSchema.safeParse(request.body);
    if (!body.success) {
        return reply.status(400).send({ error: 'invalid_input', detail: body.error.format() });
    }
    const { day, start, end } = body.data;

    const startHour = parseTime(start, 'start', 'Start');
    const endHour = parseTime(end, 'end', 'End');
    if (startHour >= endHour) {
        throw new InvalidConfigurationError(`${FIELD_LABELS.avoidTimes}: start must be before end`, 'end');
    }

    const settings = store.addAvoidTime({ day, start: formatHour24(startHour), end: formatHour24(endHour) });
    return reply.status(201).send(settings);
}

/**
 * Remove a range from the avoided time list
 *
 * @param request - Fastify request with params.index (0-based position)
 * @param reply - Fastify reply object
 * @returns 204 No Content on success
 *
 * @throws {400} Index is not a non-negative integer
 * @throws {404} No entry at that position
 */
export const removeAvoidTime = async (request: FastifyRequest, reply: FastifyReply) => {
    const params = AvoidTimeParamsSchema.safeParse(request.params);
    if (!params.success) {
        return reply.status(400).send({ error: 'invalid_input', detail: params.error.format() });
    }
    if (!store.removeAvoidTime(params.data.index)) {
        return reply.status(404).send({ error: 'not_found' });
    }
    return reply.status(204).send();
}

/**
 * Generate slots from the current settings
 *
 * The optional body overrides stored fields for this call only. Fewer slots than requested
 * is a successful response; compare `produced` with `requested`.
 *
 * @param request - Fastify request with an optional partial settings form as body
 * @param reply - Fastify reply object
 * @returns Object with requested and produced counts, serialized slots and the text listing
 *
 * @throws {400} Invalid input, invalid configuration or malformed time (names the field)
 */
export const generateSlots = async (request: FastifyRequest, reply: FastifyReply) => {
    const body = SettingsPatchSchema.safeParse(request.body ?? {});
    if (!body.success) {
        return reply.status(400).send({ error: 'invalid_input', detail: body.error.format() });
    }

    const config = parseForm(applyPatch(store.getSettings(), body.data));
    const slots = generate(config).map(serializeSlot);

    if (slots.length < config.slotCount) {
        request.log.warn({ requested: config.slotCount, produced: slots.length }, 'Fewer slots than requested');
    }

    return {
        requested: config.slotCount,
        produced: slots.length,
        slots,
        text: slots.map(slot => slot.label).join('\n')
    };
}
