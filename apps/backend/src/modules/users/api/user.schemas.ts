import { z } from 'zod';

export const updateProfileSchema = z
    .object({
        fullName: z.string().trim().min(1).max(100).nullable().optional(),
        profilePicture: z.string().url().nullable().optional()
    })
    .strict()
    .refine(body => body.fullName !== undefined || body.profilePicture !== undefined, {
        message: 'Provide fullName or profilePicture'
    });

export type UpdateProfileBody = z.infer<typeof updateProfileSchema>;

export const updatePreferencesSchema = z
    .record(z.string().trim().min(1).max(64), z.string().max(1024))
    .refine(preferences => Object.keys(preferences).length > 0, { message: 'Provide at least one preference' });

export type UpdatePreferencesBody = z.infer<typeof updatePreferencesSchema>;
