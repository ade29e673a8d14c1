const bearer = [{ bearerAuth: [] }];

const money = { type: 'string', pattern: '^\\d+\\.\\d{2}$', example: '10.00' };

const errorResponse = (description: string) => ({
  description,
  content: { 'application/json': { schema: { $ref: '#/components/schemas/Error' } } },
});

const idParam = { name: 'id', in: 'path', required: true, schema: { type: 'integer', minimum: 1 } };

function json(ref: string, description = 'OK') {
  return { description, content: { 'application/json': { schema: { $ref: `#/components/schemas/${ref}` } } } };
}

function jsonList(ref: string) {
  return {
    description: 'OK',
    content: { 'application/json': { schema: { type: 'array', items: { $ref: `#/components/schemas/${ref}` } } } },
  };
}

function body(ref: string) {
  return { required: true, content: { 'application/json': { schema: { $ref: `#/components/schemas/${ref}` } } } };
}

// Alias, not interface: swagger-ui-express takes an index-signature type
export type OpenApiDocument = {
  openapi: string;
  info: Record<string, unknown>;
  security: unknown[];
  components: Record<string, unknown>;
  paths: Record<string, unknown>;
};

/** OpenAPI 3 document served at /docs. */
export function buildSwaggerSpec(): OpenApiDocument {
  return {
    openapi: '3.0.3',
    info: {
      title: 'Restaurant Ordering API',
      version: '1.0.0',
      description: 'Catalog, per-user cart and role-gated order lifecycle.',
    },
    security: bearer,
    components: {
      securitySchemes: {
        bearerAuth: { type: 'http', scheme: 'bearer', bearerFormat: 'Firebase ID token' },
      },
      schemas: {
        Error: {
          type: 'object',
          properties: {
            error: { type: 'string' },
            fields: { type: 'object', additionalProperties: { type: 'array', items: { type: 'string' } } },
          },
          required: ['error'],
        },
        Category: {
          type: 'object',
          properties: { id: { type: 'integer' }, slug: { type: 'string' }, title: { type: 'string' } },
        },
        CategoryInput: {
          type: 'object',
          properties: { slug: { type: 'string', maxLength: 50 }, title: { type: 'string', maxLength: 255 } },
          required: ['slug', 'title'],
        },
        MenuItem: {
          type: 'object',
          properties: {
            id: { type: 'integer' },
            title: { type: 'string' },
            price: money,
            featured: { type: 'boolean' },
            category: { $ref: '#/components/schemas/Category' },
          },
        },
        MenuItemInput: {
          type: 'object',
          properties: {
            title: { type: 'string', maxLength: 255 },
            price: money,
            featured: { type: 'boolean', default: false },
            category_id: { type: 'integer' },
          },
          required: ['title', 'price', 'category_id'],
        },
        MenuItemPage: {
          type: 'object',
          properties: {
            count: { type: 'integer' },
            next: { type: 'string', nullable: true },
            previous: { type: 'string', nullable: true },
            results: { type: 'array', items: { $ref: '#/components/schemas/MenuItem' } },
          },
        },
        CartItem: {
          type: 'object',
          properties: {
            id: { type: 'integer' },
            menuitem: { type: 'integer' },
            menuitem_title: { type: 'string' },
            quantity: { type: 'integer', minimum: 1, maximum: 32767 },
            unit_price: money,
            price: money,
          },
        },
        CartItemInput: {
          type: 'object',
          properties: { menuitem: { type: 'integer' }, quantity: { type: 'integer', minimum: 1, maximum: 32767 } },
          required: ['menuitem', 'quantity'],
        },
        OrderItem: {
          type: 'object',
          properties: {
            id: { type: 'integer' },
            menuitem: { type: 'integer' },
            menuitem_title: { type: 'string' },
            quantity: { type: 'integer' },
            unit_price: money,
            price: money,
          },
        },
        Order: {
          type: 'object',
          properties: {
            id: { type: 'integer' },
            user: { type: 'integer' },
            delivery_crew: { type: 'integer', nullable: true },
            status: { type: 'integer', enum: [0, 1] },
            total: money,
            created: { type: 'string', format: 'date-time' },
            order_items: { type: 'array', items: { $ref: '#/components/schemas/OrderItem' } },
          },
        },
        OrderPatch: {
          type: 'object',
          properties: { delivery_crew: { type: 'integer' }, status: { type: 'integer', enum: [1] } },
          additionalProperties: false,
        },
        User: {
          type: 'object',
          properties: {
            id: { type: 'integer' },
            username: { type: 'string' },
            email: { type: 'string', nullable: true },
            roles: { type: 'array', items: { type: 'string' } },
          },
        },
        Username: {
          type: 'object',
          properties: { username: { type: 'string' } },
          required: ['username'],
        },
      },
    },
    paths: {
      '/health': { get: { security: [], summary: 'Liveness probe', responses: { 200: { description: 'OK' } } } },
      '/api/users/register': {
        post: {
          summary: 'Create the profile for the bearer token subject',
          requestBody: body('Username'),
          responses: { 201: json('User', 'Created'), 400: errorResponse('Invalid or already registered'), 401: errorResponse('Bad token') },
        },
      },
      '/api/users/me': { get: { summary: 'Current profile', responses: { 200: json('User') } } },
      '/api/users': { get: { summary: 'All users (staff)', responses: { 200: jsonList('User'), 403: errorResponse('Not staff') } } },
      '/api/groups/{group}/users': {
        parameters: [{ name: 'group', in: 'path', required: true, schema: { type: 'string', enum: ['manager', 'delivery-crew'] } }],
        get: { summary: 'Group members (staff)', responses: { 200: jsonList('User') } },
        post: {
          summary: 'Add a user to the group (staff)',
          requestBody: body('Username'),
          responses: { 201: { description: 'Added' }, 400: errorResponse('Missing username'), 404: errorResponse('Unknown user') },
        },
      },
      '/api/groups/{group}/users/{id}': {
        parameters: [
          { name: 'group', in: 'path', required: true, schema: { type: 'string', enum: ['manager', 'delivery-crew'] } },
          idParam,
        ],
        delete: { summary: 'Remove a user from the group (staff)', responses: { 204: { description: 'Removed' }, 404: errorResponse('Unknown user or not a member') } },
      },
      '/api/categories': {
        get: {
          summary: 'List categories',
          parameters: [
            { name: 'search', in: 'query', schema: { type: 'string' } },
            { name: 'ordering', in: 'query', schema: { type: 'string', enum: ['title', '-title'] } },
          ],
          responses: { 200: jsonList('Category') },
        },
        post: { summary: 'Create a category (staff)', requestBody: body('CategoryInput'), responses: { 201: json('Category', 'Created') } },
      },
      '/api/categories/{id}': {
        parameters: [idParam],
        get: { responses: { 200: json('Category'), 404: errorResponse('Not found') } },
        put: { requestBody: body('CategoryInput'), responses: { 200: json('Category') } },
        patch: { requestBody: body('CategoryInput'), responses: { 200: json('Category') } },
        delete: { responses: { 403: errorResponse('Categories cannot be deleted') } },
      },
      '/api/menu-items': {
        get: {
          summary: 'Paginated menu',
          parameters: [
            { name: 'page', in: 'query', schema: { type: 'integer', minimum: 1 } },
            { name: 'page_size', in: 'query', schema: { type: 'integer', minimum: 1, maximum: 100 } },
            { name: 'search', in: 'query', schema: { type: 'string' } },
            { name: 'category_title', in: 'query', schema: { type: 'string' } },
            { name: 'title', in: 'query', schema: { type: 'string' } },
            { name: 'ordering', in: 'query', schema: { type: 'string' }, example: 'price,-title' },
          ],
          responses: { 200: json('MenuItemPage'), 404: errorResponse('Invalid page') },
        },
        post: { summary: 'Create a menu item (staff)', requestBody: body('MenuItemInput'), responses: { 201: json('MenuItem', 'Created') } },
      },
      '/api/menu-items/{id}': {
        parameters: [idParam],
        get: { responses: { 200: json('MenuItem'), 404: errorResponse('Not found') } },
        put: { requestBody: body('MenuItemInput'), responses: { 200: json('MenuItem') } },
        patch: { requestBody: body('MenuItemInput'), responses: { 200: json('MenuItem') } },
        delete: { responses: { 204: { description: 'Deleted, along with its cart rows' } } },
      },
      '/api/cart': {
        get: { summary: "Caller's cart", responses: { 200: jsonList('CartItem') } },
        post: {
          summary: 'Add to cart, merging into an existing line',
          requestBody: body('CartItemInput'),
          responses: { 201: json('CartItem', 'Created'), 400: errorResponse('Invalid quantity or overflow') },
        },
      },
      '/api/cart/clear': { delete: { summary: 'Empty the cart', responses: { 204: { description: 'Cleared' } } } },
      '/api/cart/{id}': {
        parameters: [idParam],
        delete: { responses: { 204: { description: 'Removed' }, 404: errorResponse('Not found') } },
      },
      '/api/orders': {
        get: {
          summary: 'Orders visible to the caller',
          parameters: [
            { name: 'status', in: 'query', schema: { type: 'string', enum: ['pending', 'delivered'] } },
            { name: 'user_id', in: 'query', schema: { type: 'integer' } },
            { name: 'ordering', in: 'query', schema: { type: 'string', enum: ['total', '-total', 'created', '-created', 'id', '-id'] } },
          ],
          responses: { 200: jsonList('Order') },
        },
        post: { summary: 'Convert the cart into an order', responses: { 201: json('Order', 'Created'), 400: errorResponse('Empty cart') } },
      },
      '/api/orders/{id}': {
        parameters: [idParam],
        get: { responses: { 200: json('Order'), 404: errorResponse('Not found') } },
        patch: {
          summary: 'Assign a delivery crew and/or mark delivered',
          requestBody: body('OrderPatch'),
          responses: {
            200: json('Order'),
            400: errorResponse('Invalid transition'),
            403: errorResponse('Role not allowed'),
            404: errorResponse('Not found'),
            405: errorResponse('Order already delivered'),
          },
        },
      },
    },
  };
}
