// src/controllers/participantController.ts

import { Request, Response } from "express";
import { z } from "zod";
import Participant, { GENDERS, IParticipant } from "../models/Participant";
import { readSubmittedLocation } from "../services/locationNormalizer";
import { GUID_PATTERN, makeGuid } from "../utils/guid";
import { definedFields, validationErrorBody } from "../utils/validation";
import { sendServerError } from "./httpErrors";

const NAME_MESSAGE = "name is required and must be a string.";
const AGE_RANGE_MESSAGE = "age must be a reasonable integer.";
const GENDER_MESSAGE = "gender must be one of male/female/other/prefer_not_to_say or omitted.";

// Digits, spaces and dashes, optionally led by "+"
const PHONE_PATTERN = /^[+\d][\d\-\s]{5,20}$/;
const EMAIL_PATTERN = /^[^@]+@[^@]+\.[^@]+$/;

const participantFields = {
  name: z
    .string({ required_error: NAME_MESSAGE, invalid_type_error: NAME_MESSAGE })
    .min(1, NAME_MESSAGE),
  age: z.coerce
    .number({ invalid_type_error: "age must be an integer." })
    .int("age must be an integer.")
    .min(0, AGE_RANGE_MESSAGE)
    .max(120, AGE_RANGE_MESSAGE),
  gender: z.enum(GENDERS, { errorMap: () => ({ message: GENDER_MESSAGE }) }),
  survey_id: z
    .string({ invalid_type_error: "survey_id must be a GUID." })
    .regex(GUID_PATTERN, "survey_id must be a GUID."),
  phone: z.coerce.string().regex(PHONE_PATTERN, "invalid phone format."),
  email: z
    .string({ invalid_type_error: "invalid email format." })
    .regex(EMAIL_PATTERN, "invalid email format."),
  location: z.unknown().transform((value, ctx) => {
    const location = readSubmittedLocation(value);
    if (typeof location === "string") {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: location });
      return z.NEVER;
    }
    return location;
  }),
};

const ParticipantCreateSchema = z.object({
  name: participantFields.name,
  age: participantFields.age.nullish(),
  gender: participantFields.gender.nullish(),
  survey_id: participantFields.survey_id.nullish(),
  phone: participantFields.phone.nullish(),
  email: participantFields.email.nullish(),
  location: participantFields.location.nullish(),
});

const ParticipantUpdateSchema = z.object(participantFields).partial();

/**
 * @desc Accepts `{ name, age?, gender?, survey_id?, phone?, email?, location? }`;
 * the name is stored as `first_name`
 */
export const handleCreateParticipant = async (req: Request, res: Response): Promise<void> => {
  try {
    const parsed = ParticipantCreateSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json(validationErrorBody(parsed.error));
      return;
    }

    const { name, age, gender, survey_id, phone, email, location } = parsed.data;
    const participant: IParticipant = {
      _id: makeGuid(),
      first_name: name,
      age: age ?? null,
      gender: gender ?? null,
      survey_id: survey_id ?? null,
      phone: phone ?? null,
      email: email ?? null,
      location: location ?? null,
      created_at: new Date().toISOString(),
    };
    await Participant.create(participant);

    res.status(201).json({
      success: true,
      message: "Participant created successfully.",
      data: { participant_id: participant._id },
    });
  } catch (error) {
    console.error("Error creating participant:", error);
    sendServerError(res, error);
  }
};

export const handleGetAllParticipants = async (req: Request, res: Response): Promise<void> => {
  try {
    const participants = await Participant.find({}).lean();
    res.status(200).json({ success: true, data: participants });
  } catch (error) {
    sendServerError(res, error);
  }
};

export const handleGetParticipant = async (req: Request, res: Response): Promise<void> => {
  try {
    const participant = await Participant.findOne({ _id: req.params.participantId }).lean();
    if (!participant) {
      res.status(404).json({ success: false, message: "Participant not found" });
      return;
    }
    res.status(200).json({ success: true, data: participant });
  } catch (error) {
    sendServerError(res, error);
  }
};

export const handleUpdateParticipant = async (req: Request, res: Response): Promise<void> => {
  try {
    const parsed = ParticipantUpdateSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json(validationErrorBody(parsed.error));
      return;
    }
    const { name, ...rest } = parsed.data;
    const updates = definedFields({ first_name: name, ...rest });
    if (Object.keys(updates).length === 0) {
      res.status(400).json({ success: false, message: "No updatable fields provided" });
      return;
    }

    const participant = await Participant.findOneAndUpdate(
      { _id: req.params.participantId },
      { $set: { ...updates, updated_at: new Date().toISOString() } },
      { new: true }
    ).lean();
    if (!participant) {
      res.status(404).json({ success: false, message: "Participant not found" });
      return;
    }
    res.status(200).json({ success: true, message: "Participant updated", data: participant });
  } catch (error) {
    sendServerError(res, error);
  }
};

export const handleDeleteParticipant = async (req: Request, res: Response): Promise<void> => {
  try {
    const result = await Participant.deleteOne({ _id: req.params.participantId });
    if (result.deletedCount === 0) {
      res.status(404).json({ success: false, message: "Participant not found" });
      return;
    }
    res.status(200).json({ success: true, message: "Participant deleted successfully" });
  } catch (error) {
    sendServerError(res, error);
  }
};
