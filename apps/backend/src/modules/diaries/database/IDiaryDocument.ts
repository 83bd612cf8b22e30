/**
 * Kinds of content a diary entry can hold.
 */
export const ENTRY_CONTENT_TYPES = ['text', 'image', 'audio', 'drawing', 'video', 'location', 'mixed'] as const;

export type EntryContentType = (typeof ENTRY_CONTENT_TYPES)[number];

/**
 * A media attachment of an entry, pointing at a file served by the media module or elsewhere.
 */
export interface IMediaContent {
    url: string;
    /** MIME type of the attachment, e.g. `image/jpeg`. */
    contentType: string;
    thumbnailUrl: string | null;
    description: string | null;
}

/**
 * Diary record in the `diaries` collection.
 */
export interface IDiaryDocument {
    _id: string;
    /** Owner; every diary query is scoped by it. */
    userId: string;
    title: string;
    description: string | null;
    coverImage: string | null;
    createdAt: Date;
    updatedAt: Date;
}

/**
 * Entry record in the `diary_entries` collection.
 *
 * `userId` repeats the owner of the diary so search can run over all of a
 * user's entries without a join.
 */
export interface IDiaryEntryDocument {
    _id: string;
    diaryId: string;
    userId: string;
    title: string;
    content: string | null;
    contentType: EntryContentType;
    mediaContent: IMediaContent[];
    /** `[longitude, latitude]` */
    location: [number, number] | null;
    locationName: string | null;
    tags: string[];
    createdAt: Date;
    updatedAt: Date;
}

export interface IDiary {
    id: string;
    userId: string;
    title: string;
    description: string | null;
    coverImage: string | null;
    createdAt: Date;
    updatedAt: Date;
}

export interface IDiaryEntry {
    id: string;
    diaryId: string;
    userId: string;
    title: string;
    content: string | null;
    contentType: EntryContentType;
    mediaContent: IMediaContent[];
    location: [number, number] | null;
    locationName: string | null;
    tags: string[];
    createdAt: Date;
    updatedAt: Date;
}
