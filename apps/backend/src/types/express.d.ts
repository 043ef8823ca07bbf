declare global {
    namespace Express {
        interface Request {
            /**
             * Correlation id set by the request-context middleware.
             */
            id?: string;

            /**
             * Acting admin user recorded in audit fields, set by requireAdmin.
             */
            actor?: string;
        }
    }
}

export {};
