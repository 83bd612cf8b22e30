import { z } from 'zod';

export const googleLoginSchema = z.object({
    token: z.string().trim().min(1, 'Google OAuth token is required')
});

export type GoogleLoginBody = z.infer<typeof googleLoginSchema>;
